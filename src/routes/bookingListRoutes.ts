import { Router } from "express";
import { bookingListHandlers } from "../controllers/bookingListController";
import { BookingRepository } from "../repositories/bookingRepository";

export default function bookingListRoutes(repository: BookingRepository): Router {
  const router = Router();
  const handlers = bookingListHandlers(repository);

  router.get("/", handlers.listBookingsHandler);
  router.get("/customer/:customerId", handlers.listCustomerBookingsHandler);
  router.get("/date/:date", handlers.listBookingsByCheckInDateHandler);
  router.get("/room-type/:roomTypeId", handlers.listRoomTypeBookingsHandler);

  return router;
}
