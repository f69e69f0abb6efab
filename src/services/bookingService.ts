import { BookingRepository } from "../repositories/bookingRepository";
import { AppError } from "../utils/AppError";
import type { Booking, BookingStatus, StoredBooking } from "../types";

export function createBookingService(
  repository: BookingRepository,
  data: Booking
): StoredBooking {
  const result = repository.create(data);
  if (!result.ok) {
    throw new AppError(
      result.reason === "server-owned-fields"
        ? "bookingId and status are assigned by the server and must not be set"
        : "Booking could not be created",
      400
    );
  }
  return result.booking;
}

export function getBookingService(
  repository: BookingRepository,
  bookingId: number
): StoredBooking {
  const booking = repository.fetchById(bookingId);
  if (!booking) {
    throw new AppError("Booking not found", 404);
  }
  return booking;
}

export function changeBookingStatusService(
  repository: BookingRepository,
  bookingId: number,
  status: Extract<BookingStatus, "Complete" | "Cancelled">
): boolean {
  return repository.setStatus(bookingId, status);
}
