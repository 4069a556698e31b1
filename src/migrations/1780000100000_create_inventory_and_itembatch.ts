import type { MigrationBuilder } from 'node-pg-migrate';

export async function up(pgm: MigrationBuilder): Promise<void> {
  // inventory_id is the warehouse id: one row per (warehouse, item).
  pgm.createTable('inventory', {
    inventory_id: { type: 'integer', notNull: true, references: 'warehouse', onDelete: 'RESTRICT' },
    item_id: { type: 'integer', notNull: true, references: 'item', onDelete: 'RESTRICT' },
    usable_qty: { type: 'numeric(12,2)', notNull: true, default: 0 },
    reserved_qty: { type: 'numeric(12,2)', notNull: true, default: 0 },
    uom_code: { type: 'varchar(25)', notNull: true },
    status_code: { type: 'char(1)', notNull: true, default: 'A' },
    create_by_id: { type: 'varchar(20)', notNull: true },
    create_dtime: { type: 'timestamp', notNull: true, default: pgm.func('now()') },
    update_by_id: { type: 'varchar(20)', notNull: true },
    update_dtime: { type: 'timestamp', notNull: true, default: pgm.func('now()') },
    version_nbr: { type: 'integer', notNull: true, default: 1 }
  });
  pgm.addConstraint('inventory', 'pk_inventory', { primaryKey: ['inventory_id', 'item_id'] });
  pgm.addConstraint('inventory', 'c_inventory_qty', {
    check: 'usable_qty >= 0 AND reserved_qty >= 0 AND reserved_qty <= usable_qty'
  });

  pgm.createTable('itembatch', {
    batch_id: { type: 'serial', primaryKey: true },
    inventory_id: { type: 'integer', notNull: true },
    item_id: { type: 'integer', notNull: true },
    batch_no: { type: 'varchar(20)', notNull: true },
    batch_date: { type: 'date', notNull: true },
    expiry_date: { type: 'date' },
    usable_qty: { type: 'numeric(12,2)', notNull: true, default: 0 },
    reserved_qty: { type: 'numeric(12,2)', notNull: true, default: 0 },
    uom_code: { type: 'varchar(25)', notNull: true },
    size_spec: { type: 'varchar(30)' },
    status_code: { type: 'char(1)', notNull: true, default: 'A' },
    create_by_id: { type: 'varchar(20)', notNull: true },
    create_dtime: { type: 'timestamp', notNull: true, default: pgm.func('now()') },
    update_by_id: { type: 'varchar(20)', notNull: true },
    update_dtime: { type: 'timestamp', notNull: true, default: pgm.func('now()') },
    version_nbr: { type: 'integer', notNull: true, default: 1 }
  });
  pgm.sql(
    `ALTER TABLE itembatch
       ADD CONSTRAINT fk_itembatch_inventory FOREIGN KEY (inventory_id, item_id)
       REFERENCES inventory (inventory_id, item_id) ON DELETE RESTRICT`
  );
  pgm.addConstraint('itembatch', 'c_itembatch_qty', {
    check: 'usable_qty >= 0 AND reserved_qty >= 0 AND reserved_qty <= usable_qty'
  });
  pgm.addConstraint('itembatch', 'c_itembatch_status', { check: "status_code IN ('A', 'I')" });
  pgm.addConstraint('itembatch', 'uk_itembatch_batch_no', { unique: ['inventory_id', 'item_id', 'batch_no'] });

  pgm.createIndex('itembatch', ['item_id', 'status_code'], { name: 'idx_itembatch_item_status' });
}

export async function down(pgm: MigrationBuilder): Promise<void> {
  pgm.dropTable('itembatch');
  pgm.dropTable('inventory');
}
