import { Router } from "express";
import { bookingHandlers } from "../controllers/bookingController";
import { BookingRepository } from "../repositories/bookingRepository";

export default function bookingRoutes(repository: BookingRepository): Router {
  const router = Router();
  const handlers = bookingHandlers(repository);

  router.post("/", handlers.createBookingHandler);                        // POST /booking
  router.get("/:bookingId", handlers.getBookingHandler);                  // GET /booking/:bookingId
  router.put("/:bookingId/complete", handlers.completeBookingHandler);    // PUT /booking/:bookingId/complete
  router.delete("/:bookingId", handlers.cancelBookingHandler);            // DELETE /booking/:bookingId

  return router;
}
