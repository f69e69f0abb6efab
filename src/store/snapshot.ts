import fs from "fs";
import path from "path";
import { decode, encode } from "@msgpack/msgpack";
import { z } from "zod";
import {
  BOOKING_STATUSES,
  MAX_BOOKING_ID,
  MAX_CUSTOMER_ID,
  MAX_ROOM_TYPE_ID,
  type StoredBooking,
} from "../types";

// The file carries no version tag, so the record shape itself is the format check.
// .strict() refuses records written by an older or newer Booking shape.
const storedBookingSchema = z
  .object({
    bookingId: z.number().int().min(1).max(MAX_BOOKING_ID),
    customerId: z.number().int().min(0).max(MAX_CUSTOMER_ID),
    roomTypeId: z.number().int().min(0).max(MAX_ROOM_TYPE_ID),
    checkInDate: z.string(),
    checkOutDate: z.string(),
    status: z.enum(BOOKING_STATUSES),
  })
  .strict();

const snapshotSchema = z.record(z.string(), storedBookingSchema);

export class SnapshotError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "SnapshotError";
    Object.setPrototypeOf(this, SnapshotError.prototype);
  }
}

export function snapshotExists(filePath: string): boolean {
  return fs.existsSync(filePath);
}

/**
 * Reads and decodes a whole snapshot file.
 *
 * @throws SnapshotError when the file cannot be read, is not valid MessagePack,
 * or holds records that do not match the current Booking shape.
 */
export function loadSnapshot(filePath: string): Map<number, StoredBooking> {
  let raw: unknown;
  try {
    raw = decode(fs.readFileSync(filePath));
  } catch (err) {
    throw new SnapshotError(`Could not read snapshot at ${filePath}`, { cause: err });
  }

  const parsed = snapshotSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new SnapshotError(
      `Snapshot at ${filePath} has an incompatible format: ${issue.path.join(".")} ${issue.message}`
    );
  }

  const bookings = new Map<number, StoredBooking>();
  for (const [key, booking] of Object.entries(parsed.data)) {
    if (String(booking.bookingId) !== key) {
      throw new SnapshotError(
        `Snapshot at ${filePath} stores booking ${booking.bookingId} under key ${key}`
      );
    }
    bookings.set(booking.bookingId, booking);
  }
  return bookings;
}

// Rewrites the whole file. Failures are logged and reported as false so that a
// snapshot write never fails the booking operation that triggered it.
export function saveSnapshot(
  filePath: string,
  bookings: ReadonlyMap<number, StoredBooking>
): boolean {
  try {
    const payload: Record<string, StoredBooking> = {};
    for (const [id, booking] of bookings) {
      payload[String(id)] = booking;
    }
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, encode(payload));
    return true;
  } catch (err) {
    console.error(`[Snapshot] Failed to write ${filePath}:`, err);
    return false;
  }
}
