import type { AuditStamp } from '../../../lib/audit';
import { toNumber } from '../../../lib/numbers';
import type { QueryRunner } from '../../../lib/queryRunner';
import type { AllocationStore, InventoryKey, LockOptions } from '../store';
import type {
  BatchRecord,
  InventoryRecord,
  ItemRecord,
  LineStatusCode,
  PackageItemKey,
  PackageItemRecord,
  PackageStatusCode,
  ReliefPackageRecord,
  RequestLineRecord
} from '../types';

type ItemRow = {
  item_id: number;
  item_code: string;
  item_name: string;
  default_uom_code: string;
  can_expire_flag: boolean;
  is_batched_flag: boolean;
};

type BatchRow = {
  batch_id: number;
  inventory_id: number;
  warehouse_id: number;
  warehouse_name: string;
  item_id: number;
  batch_no: string;
  batch_date: string;
  expiry_date: string | null;
  usable_qty: string;
  reserved_qty: string;
  uom_code: string;
  size_spec: string | null;
  version_nbr: number;
};

type InventoryRow = {
  inventory_id: number;
  item_id: number;
  usable_qty: string;
  reserved_qty: string;
  version_nbr: number;
};

type PackageRow = {
  reliefpkg_id: number;
  reliefrqst_id: number;
  status_code: PackageStatusCode;
  version_nbr: number;
};

type RequestLineRow = {
  reliefrqst_id: number;
  item_id: number;
  request_qty: string;
  issue_qty: string;
  status_code: LineStatusCode;
  version_nbr: number;
};

type PackageItemRow = {
  reliefpkg_id: number;
  fr_inventory_id: number;
  batch_id: number;
  item_id: number;
  item_qty: string;
  uom_code: string;
  version_nbr: number;
  update_by_id: string | null;
  update_dtime: Date | null;
};

const BATCH_COLUMNS = `b.batch_id, b.inventory_id, w.warehouse_id, w.warehouse_name, b.item_id, b.batch_no,
       b.batch_date, b.expiry_date, b.usable_qty, b.reserved_qty, b.uom_code, b.size_spec, b.version_nbr`;

function lockClause(options: LockOptions | undefined, of?: string) {
  if (!options?.forUpdate) return '';
  return of ? ` FOR UPDATE OF ${of}` : ' FOR UPDATE';
}

function mapItem(row: ItemRow): ItemRecord {
  return {
    itemId: row.item_id,
    itemCode: row.item_code,
    itemName: row.item_name,
    defaultUomCode: row.default_uom_code,
    canExpire: row.can_expire_flag,
    isBatched: row.is_batched_flag
  };
}

function mapBatch(row: BatchRow): BatchRecord {
  return {
    batchId: row.batch_id,
    inventoryId: row.inventory_id,
    warehouseId: row.warehouse_id,
    warehouseName: row.warehouse_name,
    itemId: row.item_id,
    batchNo: row.batch_no,
    batchDate: row.batch_date,
    expiryDate: row.expiry_date,
    usableQty: toNumber(row.usable_qty),
    reservedQty: toNumber(row.reserved_qty),
    uomCode: row.uom_code,
    sizeSpec: row.size_spec,
    versionNbr: row.version_nbr
  };
}

function mapInventory(row: InventoryRow): InventoryRecord {
  return {
    inventoryId: row.inventory_id,
    itemId: row.item_id,
    usableQty: toNumber(row.usable_qty),
    reservedQty: toNumber(row.reserved_qty),
    versionNbr: row.version_nbr
  };
}

function mapPackage(row: PackageRow): ReliefPackageRecord {
  return {
    packageId: row.reliefpkg_id,
    reliefRequestId: row.reliefrqst_id,
    statusCode: row.status_code,
    versionNbr: row.version_nbr
  };
}

function mapRequestLine(row: RequestLineRow): RequestLineRecord {
  return {
    reliefRequestId: row.reliefrqst_id,
    itemId: row.item_id,
    requestQty: toNumber(row.request_qty),
    issueQty: toNumber(row.issue_qty),
    statusCode: row.status_code,
    versionNbr: row.version_nbr
  };
}

function mapPackageItem(row: PackageItemRow): PackageItemRecord {
  return {
    packageId: row.reliefpkg_id,
    inventoryId: row.fr_inventory_id,
    batchId: row.batch_id,
    itemId: row.item_id,
    itemQty: toNumber(row.item_qty),
    uomCode: row.uom_code,
    versionNbr: row.version_nbr,
    updateById: row.update_by_id,
    updateDtime: row.update_dtime
  };
}

function packageItemKeyParams(key: PackageItemKey): number[] {
  return [key.packageId, key.inventoryId, key.batchId, key.itemId];
}

export function createPgAllocationStore(run: QueryRunner): AllocationStore {
  return {
    async findItem(itemId) {
      const res = await run<ItemRow>(
        `SELECT item_id, item_code, item_name, default_uom_code, can_expire_flag, is_batched_flag
           FROM item
          WHERE item_id = $1`,
        [itemId]
      );
      return res.rows[0] ? mapItem(res.rows[0]) : null;
    },

    async listItemBatches(itemId, options) {
      const res = await run<BatchRow>(
        `SELECT ${BATCH_COLUMNS}
           FROM itembatch b
           JOIN warehouse w ON w.warehouse_id = b.inventory_id
          WHERE b.item_id = $1
            AND b.status_code = 'A'
            AND w.status_code = 'A'
            AND ($2::varchar IS NULL OR b.uom_code = $2)
          ORDER BY b.batch_id${lockClause(options, 'b')}`,
        [itemId, options?.uomCode ?? null]
      );
      return res.rows.map(mapBatch);
    },

    async listBatchesByIds(batchIds, options) {
      if (batchIds.length === 0) return [];
      const res = await run<BatchRow>(
        `SELECT ${BATCH_COLUMNS}
           FROM itembatch b
           JOIN warehouse w ON w.warehouse_id = b.inventory_id
          WHERE b.batch_id = ANY($1::int[])
          ORDER BY b.batch_id${lockClause(options, 'b')}`,
        [batchIds]
      );
      return res.rows.map(mapBatch);
    },

    async listInventory(keys: InventoryKey[], options) {
      if (keys.length === 0) return [];
      const res = await run<InventoryRow>(
        `SELECT inventory_id, item_id, usable_qty, reserved_qty, version_nbr
           FROM inventory
          WHERE (inventory_id, item_id) IN (SELECT * FROM unnest($1::int[], $2::int[]))
          ORDER BY inventory_id, item_id${lockClause(options)}`,
        [keys.map((key) => key.inventoryId), keys.map((key) => key.itemId)]
      );
      return res.rows.map(mapInventory);
    },

    async findPackage(packageId, options) {
      const res = await run<PackageRow>(
        `SELECT reliefpkg_id, reliefrqst_id, status_code, version_nbr
           FROM reliefpkg
          WHERE reliefpkg_id = $1${lockClause(options)}`,
        [packageId]
      );
      return res.rows[0] ? mapPackage(res.rows[0]) : null;
    },

    async listRequestLines(reliefRequestId, options) {
      const res = await run<RequestLineRow>(
        `SELECT reliefrqst_id, item_id, request_qty, issue_qty, status_code, version_nbr
           FROM reliefrqst_item
          WHERE reliefrqst_id = $1
          ORDER BY item_id${lockClause(options)}`,
        [reliefRequestId]
      );
      return res.rows.map(mapRequestLine);
    },

    async listPackageItems(packageId, options) {
      const res = await run<PackageItemRow>(
        `SELECT reliefpkg_id, fr_inventory_id, batch_id, item_id, item_qty, uom_code,
                version_nbr, update_by_id, update_dtime
           FROM reliefpkg_item
          WHERE reliefpkg_id = $1
            AND ($2::int IS NULL OR item_id = $2)
          ORDER BY item_id, batch_id${lockClause(options)}`,
        [packageId, options?.itemId ?? null]
      );
      return res.rows.map(mapPackageItem);
    },

    async insertPackageItem(row, stamp: AuditStamp) {
      await run(
        `INSERT INTO reliefpkg_item (
           reliefpkg_id, fr_inventory_id, batch_id, item_id, item_qty, uom_code,
           create_by_id, create_dtime, update_by_id, update_dtime, version_nbr
         ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $7, $8, 1)`,
        [...packageItemKeyParams(row), row.itemQty, row.uomCode, stamp.actorId, stamp.at]
      );
    },

    async updatePackageItem(key, change, expectedVersion, stamp) {
      const res = await run(
        `UPDATE reliefpkg_item
            SET item_qty = $5,
                uom_code = $6,
                update_by_id = $7,
                update_dtime = $8,
                version_nbr = version_nbr + 1
          WHERE reliefpkg_id = $1 AND fr_inventory_id = $2 AND batch_id = $3 AND item_id = $4
            AND version_nbr = $9`,
        [...packageItemKeyParams(key), change.itemQty, change.uomCode, stamp.actorId, stamp.at, expectedVersion]
      );
      return (res.rowCount ?? 0) > 0;
    },

    async deletePackageItem(key, expectedVersion) {
      const res = await run(
        `DELETE FROM reliefpkg_item
          WHERE reliefpkg_id = $1 AND fr_inventory_id = $2 AND batch_id = $3 AND item_id = $4
            AND version_nbr = $5`,
        [...packageItemKeyParams(key), expectedVersion]
      );
      return (res.rowCount ?? 0) > 0;
    },

    async updateBatchReservation(batchId, reservedQty, expectedVersion, stamp) {
      const res = await run(
        `UPDATE itembatch
            SET reserved_qty = $2,
                update_by_id = $3,
                update_dtime = $4,
                version_nbr = version_nbr + 1
          WHERE batch_id = $1 AND version_nbr = $5`,
        [batchId, reservedQty, stamp.actorId, stamp.at, expectedVersion]
      );
      return (res.rowCount ?? 0) > 0;
    },

    async updateInventoryReservation(key, reservedQty, expectedVersion, stamp) {
      const res = await run(
        `UPDATE inventory
            SET reserved_qty = $3,
                update_by_id = $4,
                update_dtime = $5,
                version_nbr = version_nbr + 1
          WHERE inventory_id = $1 AND item_id = $2 AND version_nbr = $6`,
        [key.inventoryId, key.itemId, reservedQty, stamp.actorId, stamp.at, expectedVersion]
      );
      return (res.rowCount ?? 0) > 0;
    },

    async updateRequestLineStatus(key, statusCode, expectedVersion, stamp) {
      const res = await run(
        `UPDATE reliefrqst_item
            SET status_code = $3,
                update_by_id = $4,
                update_dtime = $5,
                version_nbr = version_nbr + 1
          WHERE reliefrqst_id = $1 AND item_id = $2 AND version_nbr = $6`,
        [key.reliefRequestId, key.itemId, statusCode, stamp.actorId, stamp.at, expectedVersion]
      );
      return (res.rowCount ?? 0) > 0;
    },

    async touchPackage(packageId, statusCode, expectedVersion, stamp) {
      const res = await run<{ version_nbr: number }>(
        `UPDATE reliefpkg
            SET status_code = $2,
                update_by_id = $3,
                update_dtime = $4,
                version_nbr = version_nbr + 1
          WHERE reliefpkg_id = $1 AND version_nbr = $5
          RETURNING version_nbr`,
        [packageId, statusCode, stamp.actorId, stamp.at, expectedVersion]
      );
      return res.rows[0]?.version_nbr ?? null;
    }
  };
}
