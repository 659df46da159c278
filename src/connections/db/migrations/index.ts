import { MigrationInfo } from './types';

import * as migration001 from './20260301_000001_create_users_table';
import * as migration002 from './20260301_000002_create_drivers_table';
import * as migration003 from './20260301_000003_create_products_table';
import * as migration004 from './20260301_000004_create_warehouses_table';
import * as migration005 from './20260301_000005_create_customers_table';
import * as migration006 from './20260301_000006_create_shipments_table';
import * as migration007 from './20260301_000007_create_status_updates_table';
import * as migration008 from './20260315_000001_add_quantity_to_shipments';

export const migrations: MigrationInfo[] = [
  { name: '20260301_000001_create_users_table', migration: migration001.migration },
  { name: '20260301_000002_create_drivers_table', migration: migration002.migration },
  { name: '20260301_000003_create_products_table', migration: migration003.migration },
  { name: '20260301_000004_create_warehouses_table', migration: migration004.migration },
  { name: '20260301_000005_create_customers_table', migration: migration005.migration },
  { name: '20260301_000006_create_shipments_table', migration: migration006.migration },
  { name: '20260301_000007_create_status_updates_table', migration: migration007.migration },
  { name: '20260315_000001_add_quantity_to_shipments', migration: migration008.migration },
];
