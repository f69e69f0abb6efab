import { canTransition } from "../store/lifecycle";
import { nextBookingId } from "../store/identityAllocator";
import { StoreLock } from "../store/lock";
import { loadSnapshot, saveSnapshot, snapshotExists } from "../store/snapshot";
import type {
  Booking,
  BookingStatus,
  CreateBookingResult,
  StoredBooking,
} from "../types";

// Callers only ever see copies; nothing outside this file holds a reference into the map
const copy = (booking: StoredBooking): StoredBooking => ({ ...booking });

export class BookingRepository {
  private bookings = new Map<number, StoredBooking>();
  private readonly lock = new StoreLock();

  constructor(private readonly snapshotPath: string) {}

  // ── Startup ───────────────────────────────────────────────────────────────────

  // Replaces the contents wholesale with the snapshot file, if there is one.
  // A failed load is logged and leaves the store empty.
  restore(): boolean {
    if (!snapshotExists(this.snapshotPath)) {
      return false;
    }
    return this.lock.run("restore", false, () => {
      try {
        this.bookings = loadSnapshot(this.snapshotPath);
      } catch (err) {
        console.error("[Store] An error occurred loading snapshot:", err);
        this.bookings = new Map();
        return false;
      }
      console.log(`[Store] Loaded snapshot with ${this.bookings.size} booking(s)`);
      return true;
    });
  }

  // ── Write ─────────────────────────────────────────────────────────────────────

  create(booking: Booking): CreateBookingResult {
    // bookingId and status belong to the store; a request carrying either is refused
    if (booking.bookingId !== undefined || booking.status !== undefined) {
      return { ok: false, reason: "server-owned-fields" };
    }

    return this.lock.run<CreateBookingResult>(
      "create",
      { ok: false, reason: "unavailable" },
      () => {
        const stored: StoredBooking = {
          bookingId: nextBookingId(this.bookings.keys()),
          customerId: booking.customerId,
          roomTypeId: booking.roomTypeId,
          checkInDate: booking.checkInDate,
          checkOutDate: booking.checkOutDate,
          status: "Confirmed",
        };
        this.bookings.set(stored.bookingId, stored);
        // The booking stays created even if the snapshot cannot be written
        saveSnapshot(this.snapshotPath, this.bookings);
        return { ok: true, booking: copy(stored) };
      }
    );
  }

  // Missing ids and forbidden transitions both answer false: no change occurred
  setStatus(bookingId: number, status: BookingStatus): boolean {
    return this.lock.run("setStatus", false, () => {
      const existing = this.bookings.get(bookingId);
      if (!existing || !canTransition(existing.status, status)) {
        return false;
      }
      this.bookings.set(bookingId, { ...existing, status });
      saveSnapshot(this.snapshotPath, this.bookings);
      return true;
    });
  }

  // ── Read ──────────────────────────────────────────────────────────────────────

  fetchById(bookingId: number): StoredBooking | undefined {
    return this.lock.run<StoredBooking | undefined>("fetchById", undefined, () => {
      const booking = this.bookings.get(bookingId);
      return booking ? copy(booking) : undefined;
    });
  }

  fetchAll(): StoredBooking[] {
    return this.filter("fetchAll", () => true);
  }

  fetchByCustomerId(customerId: number): StoredBooking[] {
    return this.filter("fetchByCustomerId", (b) => b.customerId === customerId);
  }

  fetchByRoomTypeId(roomTypeId: number): StoredBooking[] {
    return this.filter("fetchByRoomTypeId", (b) => b.roomTypeId === roomTypeId);
  }

  fetchByCheckInDate(checkInDate: string): StoredBooking[] {
    return this.filter("fetchByCheckInDate", (b) => b.checkInDate === checkInDate);
  }

  private filter(
    operation: string,
    predicate: (booking: StoredBooking) => boolean
  ): StoredBooking[] {
    return this.lock.run<StoredBooking[]>(operation, [], () =>
      Array.from(this.bookings.values()).filter(predicate).map(copy)
    );
  }
}
