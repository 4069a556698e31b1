import type { MigrationBuilder } from 'node-pg-migrate';

export async function up(pgm: MigrationBuilder): Promise<void> {
  pgm.createTable('item', {
    item_id: { type: 'serial', primaryKey: true },
    item_code: { type: 'varchar(30)', notNull: true, unique: true },
    item_name: { type: 'varchar(60)', notNull: true },
    default_uom_code: { type: 'varchar(25)', notNull: true },
    can_expire_flag: { type: 'boolean', notNull: true, default: false },
    is_batched_flag: { type: 'boolean', notNull: true, default: true },
    status_code: { type: 'char(1)', notNull: true, default: 'A' },
    create_by_id: { type: 'varchar(20)', notNull: true },
    create_dtime: { type: 'timestamp', notNull: true, default: pgm.func('now()') },
    update_by_id: { type: 'varchar(20)', notNull: true },
    update_dtime: { type: 'timestamp', notNull: true, default: pgm.func('now()') },
    version_nbr: { type: 'integer', notNull: true, default: 1 }
  });
  pgm.addConstraint('item', 'c_item_status', { check: "status_code IN ('A', 'I')" });

  pgm.createTable('warehouse', {
    warehouse_id: { type: 'serial', primaryKey: true },
    warehouse_name: { type: 'varchar(255)', notNull: true, unique: true },
    status_code: { type: 'char(1)', notNull: true, default: 'A' },
    create_by_id: { type: 'varchar(20)', notNull: true },
    create_dtime: { type: 'timestamp', notNull: true, default: pgm.func('now()') },
    update_by_id: { type: 'varchar(20)', notNull: true },
    update_dtime: { type: 'timestamp', notNull: true, default: pgm.func('now()') },
    version_nbr: { type: 'integer', notNull: true, default: 1 }
  });
  pgm.addConstraint('warehouse', 'c_warehouse_status', { check: "status_code IN ('A', 'I')" });
}

export async function down(pgm: MigrationBuilder): Promise<void> {
  pgm.dropTable('warehouse');
  pgm.dropTable('item');
}
