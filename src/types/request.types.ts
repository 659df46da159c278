import { Request } from 'express';

/**
 * Caller identity resolved once per request by the auth middleware.
 * A driver always carries the id of its driver profile.
 */
export type Actor =
  | { userId: number; username: string; role: 'manager' }
  | { userId: number; username: string; role: 'driver'; driverId: number };

export type DriverActor = Extract<Actor, { role: 'driver' }>;

/**
 * Auth Request - request carrying the authenticated caller
 */
export interface AuthRequest extends Request {
  actor?: Actor;
}
