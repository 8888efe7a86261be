import { MigrationInfo } from './types';

import * as migration001 from './20250605_000001_create_users_table';
import * as migration002 from './20250605_000002_create_password_reset_otps_table';
import * as migration003 from './20250605_000003_create_categories_table';
import * as migration004 from './20250605_000004_create_products_table';
import * as migration005 from './20250605_000005_create_orders_table';
import * as migration006 from './20250605_000006_create_order_items_table';
import * as migration007 from './20250606_000001_create_consultations_table';
import * as migration008 from './20250607_000001_create_tip_categories_table';
import * as migration009 from './20250607_000002_create_tips_tables';
import * as migration010 from './20250608_000001_create_success_stories_tables';
import * as migration011 from './20250609_000001_create_community_tables';

export const migrations: MigrationInfo[] = [
  { name: '20250605_000001_create_users_table', migration: migration001.migration },
  { name: '20250605_000002_create_password_reset_otps_table', migration: migration002.migration },
  { name: '20250605_000003_create_categories_table', migration: migration003.migration },
  { name: '20250605_000004_create_products_table', migration: migration004.migration },
  { name: '20250605_000005_create_orders_table', migration: migration005.migration },
  { name: '20250605_000006_create_order_items_table', migration: migration006.migration },
  { name: '20250606_000001_create_consultations_table', migration: migration007.migration },
  { name: '20250607_000001_create_tip_categories_table', migration: migration008.migration },
  { name: '20250607_000002_create_tips_tables', migration: migration009.migration },
  { name: '20250608_000001_create_success_stories_tables', migration: migration010.migration },
  { name: '20250609_000001_create_community_tables', migration: migration011.migration },
];
