import { Request } from "express";
import { AppError } from "./AppError";

// Reads a route param as an unsigned integer no larger than `max`, or fails with 400
export function parseIdParam(req: Request, name: string, max: number): number {
  // Express v5 types params as string | string[]; these routes only bind single segments
  const raw = String(req.params[name]);
  if (!/^\d+$/.test(raw)) {
    throw new AppError(`${name} must be an unsigned integer`, 400);
  }
  const value = Number(raw);
  if (value > max) {
    throw new AppError(`${name} is out of range`, 400);
  }
  return value;
}
