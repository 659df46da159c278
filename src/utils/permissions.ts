import { Actor, DriverActor } from '../types/request.types';
import { PermissionDeniedError } from './errors';

export const assertManager = (actor: Actor, action: string): void => {
  if (actor.role !== 'manager') {
    throw new PermissionDeniedError(`Only warehouse managers can ${action}`);
  }
};

export const assertDriver = (actor: Actor, action: string): DriverActor => {
  if (actor.role !== 'driver') {
    throw new PermissionDeniedError(`Only drivers can ${action}`);
  }
  return actor;
};
