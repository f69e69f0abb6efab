import { Request, Response } from "express";
import { BookingRepository } from "../repositories/bookingRepository";
import { MAX_CUSTOMER_ID, MAX_ROOM_TYPE_ID } from "../types";
import { parseIdParam } from "../utils/params";

export function bookingListHandlers(repository: BookingRepository) {
  return {
    listBookingsHandler(_req: Request, res: Response): void {
      res.json(repository.fetchAll());
    },

    listCustomerBookingsHandler(req: Request, res: Response): void {
      const customerId = parseIdParam(req, "customerId", MAX_CUSTOMER_ID);
      res.json(repository.fetchByCustomerId(customerId));
    },

    // Dates are matched as opaque strings, exactly as they were submitted
    listBookingsByCheckInDateHandler(req: Request, res: Response): void {
      res.json(repository.fetchByCheckInDate(String(req.params["date"])));
    },

    listRoomTypeBookingsHandler(req: Request, res: Response): void {
      const roomTypeId = parseIdParam(req, "roomTypeId", MAX_ROOM_TYPE_ID);
      res.json(repository.fetchByRoomTypeId(roomTypeId));
    },
  };
}
