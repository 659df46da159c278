/**
 * User Role Constants
 */
export const USER_ROLE = {
  MANAGER: 'manager',
  DRIVER: 'driver',
} as const;

export type UserRole = typeof USER_ROLE[keyof typeof USER_ROLE];

export const isUserRole = (value: string): value is UserRole =>
  value === USER_ROLE.MANAGER || value === USER_ROLE.DRIVER;
