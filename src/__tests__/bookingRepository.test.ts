import fs from "fs";
import os from "os";
import path from "path";
import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { BookingRepository } from "../repositories/bookingRepository";
import { loadSnapshot } from "../store/snapshot";
import type { Booking } from "../types";

const request = (overrides: Partial<Booking> = {}): Booking => ({
  customerId: 1,
  roomTypeId: 3,
  checkInDate: "2020-01-01",
  checkOutDate: "2020-01-08",
  ...overrides,
});

const ids = (bookings: Array<{ bookingId: number }>) =>
  bookings.map((b) => b.bookingId).sort((a, b) => a - b);

describe("BookingRepository", () => {
  let dir: string;
  let file: string;
  let repository: BookingRepository;

  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "booking-repo-"));
    file = path.join(dir, "bookings.snapshot");
    repository = new BookingRepository(file);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  describe("create", () => {
    it("assigns id 1 and Confirmed to the first booking", () => {
      expect(repository.create(request())).toEqual({
        ok: true,
        booking: {
          bookingId: 1,
          customerId: 1,
          roomTypeId: 3,
          checkInDate: "2020-01-01",
          checkOutDate: "2020-01-08",
          status: "Confirmed",
        },
      });
    });

    it("hands out strictly increasing ids", () => {
      const created = [1, 2, 3, 4].map(() => repository.create(request()));
      expect(created.map((r) => (r.ok ? r.booking.bookingId : 0))).toEqual([1, 2, 3, 4]);
    });

    it("refuses a request carrying a bookingId", () => {
      expect(repository.create(request({ bookingId: 7 }))).toEqual({
        ok: false,
        reason: "server-owned-fields",
      });
      expect(repository.fetchAll()).toEqual([]);
    });

    it("refuses a request carrying a status", () => {
      expect(repository.create(request({ status: "Confirmed" }))).toEqual({
        ok: false,
        reason: "server-owned-fields",
      });
      expect(repository.fetchAll()).toEqual([]);
    });

    it("writes a snapshot holding the new booking", () => {
      repository.create(request());
      expect(loadSnapshot(file).get(1)?.status).toBe("Confirmed");
    });

    it("still succeeds when the snapshot cannot be written", () => {
      vi.spyOn(console, "error").mockImplementation(() => undefined);
      const blocker = path.join(dir, "blocker");
      fs.writeFileSync(blocker, "x");
      const unwritable = new BookingRepository(path.join(blocker, "bookings.snapshot"));

      const result = unwritable.create(request());

      expect(result.ok).toBe(true);
      expect(unwritable.fetchById(1)?.status).toBe("Confirmed");
    });
  });

  describe("setStatus", () => {
    it("completes a Confirmed booking exactly once", () => {
      repository.create(request());

      expect(repository.setStatus(1, "Complete")).toBe(true);
      expect(repository.fetchById(1)?.status).toBe("Complete");

      expect(repository.setStatus(1, "Cancelled")).toBe(false);
      expect(repository.setStatus(1, "Complete")).toBe(false);
      expect(repository.fetchById(1)?.status).toBe("Complete");
    });

    it("cancels a Confirmed booking and keeps the record", () => {
      repository.create(request());

      expect(repository.setStatus(1, "Cancelled")).toBe(true);
      expect(repository.fetchAll()).toHaveLength(1);
      expect(repository.setStatus(1, "Complete")).toBe(false);
      expect(repository.fetchById(1)?.status).toBe("Cancelled");
    });

    it("returns false for an unknown id and changes nothing", () => {
      repository.create(request());

      expect(repository.setStatus(99, "Complete")).toBe(false);
      expect(repository.fetchAll().map((b) => b.status)).toEqual(["Confirmed"]);
    });

    it("persists the new status", () => {
      repository.create(request());
      repository.setStatus(1, "Cancelled");
      expect(loadSnapshot(file).get(1)?.status).toBe("Cancelled");
    });

    it("never reuses the id of a terminal booking", () => {
      repository.create(request());
      repository.setStatus(1, "Cancelled");
      const next = repository.create(request());
      expect(next.ok && next.booking.bookingId).toBe(2);
    });
  });

  describe("lookups", () => {
    beforeEach(() => {
      repository.create(request({ customerId: 1, roomTypeId: 3, checkInDate: "2020-01-01" }));
      repository.create(request({ customerId: 2, roomTypeId: 3, checkInDate: "2020-02-01" }));
      repository.create(request({ customerId: 1, roomTypeId: 4, checkInDate: "2020-02-01" }));
      repository.create(request({ customerId: 3, roomTypeId: 5, checkInDate: "2020-01-01" }));
    });

    it("fetches a booking by id", () => {
      expect(repository.fetchById(2)).toEqual({
        bookingId: 2,
        customerId: 2,
        roomTypeId: 3,
        checkInDate: "2020-02-01",
        checkOutDate: "2020-01-08",
        status: "Confirmed",
      });
      expect(repository.fetchById(42)).toBeUndefined();
    });

    it("fetches everything", () => {
      expect(ids(repository.fetchAll())).toEqual([1, 2, 3, 4]);
    });

    it("filters by customer", () => {
      expect(ids(repository.fetchByCustomerId(1))).toEqual([1, 3]);
      expect(repository.fetchByCustomerId(9)).toEqual([]);
    });

    it("filters by room type", () => {
      expect(ids(repository.fetchByRoomTypeId(3))).toEqual([1, 2]);
      expect(repository.fetchByRoomTypeId(0)).toEqual([]);
    });

    it("filters by check-in date as an exact string", () => {
      expect(ids(repository.fetchByCheckInDate("2020-02-01"))).toEqual([2, 3]);
      expect(repository.fetchByCheckInDate("2020-2-1")).toEqual([]);
    });

    it("returns copies that cannot change stored bookings", () => {
      const fetched = repository.fetchById(1);
      if (fetched) fetched.status = "Cancelled";
      for (const booking of repository.fetchAll()) booking.customerId = 77;

      expect(repository.fetchById(1)?.status).toBe("Confirmed");
      expect(repository.fetchByCustomerId(77)).toEqual([]);
    });
  });

  describe("restore", () => {
    it("returns false when there is no snapshot", () => {
      expect(repository.restore()).toBe(false);
      expect(repository.fetchAll()).toEqual([]);
    });

    it("reproduces a previous repository's bookings", () => {
      repository.create(request({ customerId: 5 }));
      repository.create(request({ customerId: 6 }));
      repository.setStatus(2, "Complete");

      const restarted = new BookingRepository(file);
      expect(restarted.restore()).toBe(true);

      expect(restarted.fetchAll().sort((a, b) => a.bookingId - b.bookingId)).toEqual(
        repository.fetchAll().sort((a, b) => a.bookingId - b.bookingId)
      );
      const next = restarted.create(request());
      expect(next.ok && next.booking.bookingId).toBe(3);
    });

    it("starts empty when the snapshot cannot be decoded", () => {
      vi.spyOn(console, "error").mockImplementation(() => undefined);
      fs.writeFileSync(file, "definitely not msgpack");

      expect(repository.restore()).toBe(false);
      expect(repository.fetchAll()).toEqual([]);
      const first = repository.create(request());
      expect(first.ok && first.booking.bookingId).toBe(1);
    });
  });
});
