import type { MigrationBuilder } from 'node-pg-migrate';

export async function up(pgm: MigrationBuilder): Promise<void> {
  pgm.createTable('reliefpkg', {
    reliefpkg_id: { type: 'serial', primaryKey: true },
    reliefrqst_id: { type: 'integer', notNull: true, references: 'reliefrqst', onDelete: 'RESTRICT' },
    to_inventory_id: { type: 'integer', references: 'warehouse', onDelete: 'RESTRICT' },
    status_code: { type: 'char(1)', notNull: true, default: 'A' },
    create_by_id: { type: 'varchar(20)', notNull: true },
    create_dtime: { type: 'timestamp', notNull: true, default: pgm.func('now()') },
    update_by_id: { type: 'varchar(20)', notNull: true },
    update_dtime: { type: 'timestamp', notNull: true, default: pgm.func('now()') },
    version_nbr: { type: 'integer', notNull: true, default: 1 }
  });
  pgm.addConstraint('reliefpkg', 'c_reliefpkg_status', { check: "status_code IN ('A', 'P', 'V', 'D')" });
  pgm.createIndex('reliefpkg', 'reliefrqst_id', { name: 'idx_reliefpkg_reliefrqst' });

  pgm.createTable('reliefpkg_item', {
    reliefpkg_id: { type: 'integer', notNull: true, references: 'reliefpkg', onDelete: 'CASCADE' },
    fr_inventory_id: { type: 'integer', notNull: true },
    batch_id: { type: 'integer', notNull: true, references: 'itembatch', onDelete: 'RESTRICT' },
    item_id: { type: 'integer', notNull: true },
    item_qty: { type: 'numeric(12,2)', notNull: true },
    uom_code: { type: 'varchar(25)', notNull: true },
    create_by_id: { type: 'varchar(20)', notNull: true },
    create_dtime: { type: 'timestamp', notNull: true, default: pgm.func('now()') },
    update_by_id: { type: 'varchar(20)', notNull: true },
    update_dtime: { type: 'timestamp', notNull: true, default: pgm.func('now()') },
    version_nbr: { type: 'integer', notNull: true, default: 1 }
  });
  pgm.addConstraint('reliefpkg_item', 'pk_reliefpkg_item', {
    primaryKey: ['reliefpkg_id', 'fr_inventory_id', 'batch_id', 'item_id']
  });
  pgm.sql(
    `ALTER TABLE reliefpkg_item
       ADD CONSTRAINT fk_reliefpkg_item_inventory FOREIGN KEY (fr_inventory_id, item_id)
       REFERENCES inventory (inventory_id, item_id) ON DELETE RESTRICT`
  );
  pgm.addConstraint('reliefpkg_item', 'c_reliefpkg_item_qty', { check: 'item_qty >= 0' });
  pgm.createIndex('reliefpkg_item', 'batch_id', { name: 'idx_reliefpkg_item_batch' });
}

export async function down(pgm: MigrationBuilder): Promise<void> {
  pgm.dropTable('reliefpkg_item');
  pgm.dropTable('reliefpkg');
}
