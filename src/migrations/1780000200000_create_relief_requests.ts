import type { MigrationBuilder } from 'node-pg-migrate';

export async function up(pgm: MigrationBuilder): Promise<void> {
  pgm.createTable('reliefrqst', {
    reliefrqst_id: { type: 'serial', primaryKey: true },
    request_date: { type: 'date', notNull: true, default: pgm.func('current_date') },
    status_code: { type: 'smallint', notNull: true, default: 0 },
    create_by_id: { type: 'varchar(20)', notNull: true },
    create_dtime: { type: 'timestamp', notNull: true, default: pgm.func('now()') },
    update_by_id: { type: 'varchar(20)', notNull: true },
    update_dtime: { type: 'timestamp', notNull: true, default: pgm.func('now()') },
    version_nbr: { type: 'integer', notNull: true, default: 1 }
  });

  pgm.createTable('reliefrqst_item', {
    reliefrqst_id: { type: 'integer', notNull: true, references: 'reliefrqst', onDelete: 'CASCADE' },
    item_id: { type: 'integer', notNull: true, references: 'item', onDelete: 'RESTRICT' },
    request_qty: { type: 'numeric(12,2)', notNull: true },
    issue_qty: { type: 'numeric(12,2)', notNull: true, default: 0 },
    status_code: { type: 'char(1)', notNull: true, default: 'R' },
    create_by_id: { type: 'varchar(20)', notNull: true },
    create_dtime: { type: 'timestamp', notNull: true, default: pgm.func('now()') },
    update_by_id: { type: 'varchar(20)', notNull: true },
    update_dtime: { type: 'timestamp', notNull: true, default: pgm.func('now()') },
    version_nbr: { type: 'integer', notNull: true, default: 1 }
  });
  pgm.addConstraint('reliefrqst_item', 'pk_reliefrqst_item', { primaryKey: ['reliefrqst_id', 'item_id'] });
  pgm.addConstraint('reliefrqst_item', 'c_reliefrqst_item_qty', {
    check: 'request_qty > 0 AND issue_qty >= 0 AND issue_qty <= request_qty'
  });
  pgm.addConstraint('reliefrqst_item', 'c_reliefrqst_item_status', {
    check: "status_code IN ('R', 'P', 'F', 'D')"
  });
}

export async function down(pgm: MigrationBuilder): Promise<void> {
  pgm.dropTable('reliefrqst_item');
  pgm.dropTable('reliefrqst');
}
