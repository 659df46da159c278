import { UserRole } from '../../../constants';

export interface User {
  id: number;
  username: string;
  phone: string;
  role: UserRole;
  is_active: boolean;
  created_at: Date;
}

/**
 * Identity resolved once per request from the bearer token
 */
export interface UserIdentity {
  id: number;
  username: string;
  role: UserRole;
  is_active: boolean;
  driver_id: number | null;
}
