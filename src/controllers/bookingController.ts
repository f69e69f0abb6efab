import { Request, Response } from "express";
import { z } from "zod";
import { BookingRepository } from "../repositories/bookingRepository";
import {
  changeBookingStatusService,
  createBookingService,
  getBookingService,
} from "../services/bookingService";
import {
  BOOKING_STATUSES,
  MAX_BOOKING_ID,
  MAX_CUSTOMER_ID,
  MAX_ROOM_TYPE_ID,
} from "../types";
import { AppError } from "../utils/AppError";
import { parseIdParam } from "../utils/params";

// bookingId and status are accepted here so the store can refuse them explicitly
const createBookingSchema = z.object({
  bookingId: z.number().int().min(0).max(MAX_BOOKING_ID).optional(),
  customerId: z
    .number({ required_error: "customerId is required" })
    .int()
    .min(0)
    .max(MAX_CUSTOMER_ID, "customerId is out of range"),
  roomTypeId: z
    .number({ required_error: "roomTypeId is required" })
    .int()
    .min(0)
    .max(MAX_ROOM_TYPE_ID, "roomTypeId is out of range"),
  checkInDate: z.string({ required_error: "checkInDate is required" }),
  checkOutDate: z.string({ required_error: "checkOutDate is required" }),
  status: z.enum(BOOKING_STATUSES).optional(),
});

export function bookingHandlers(repository: BookingRepository) {
  return {
    createBookingHandler(req: Request, res: Response): void {
      const parsed = createBookingSchema.safeParse(req.body);
      if (!parsed.success) {
        throw new AppError(parsed.error.issues[0].message, 400);
      }

      const booking = createBookingService(repository, parsed.data);
      res.status(201).json(booking);
    },

    getBookingHandler(req: Request, res: Response): void {
      const bookingId = parseIdParam(req, "bookingId", MAX_BOOKING_ID);
      res.json(getBookingService(repository, bookingId));
    },

    completeBookingHandler(req: Request, res: Response): void {
      const bookingId = parseIdParam(req, "bookingId", MAX_BOOKING_ID);
      res.json(changeBookingStatusService(repository, bookingId, "Complete"));
    },

    // Cancelling keeps the record; the booking only moves to Cancelled
    cancelBookingHandler(req: Request, res: Response): void {
      const bookingId = parseIdParam(req, "bookingId", MAX_BOOKING_ID);
      res.json(changeBookingStatusService(repository, bookingId, "Cancelled"));
    },
  };
}
