import 'dotenv/config'
import type { PoolClient } from 'pg'
import { pool, withTransaction } from '../src/db'
import { signAccessToken } from '../src/lib/auth'

type LogLevel = 'debug' | 'info' | 'warn' | 'error'

type SeedBatch = {
  warehouse: string
  batchNo: string
  batchDate: string
  expiryDate: string | null
  usableQty: number
}

type SeedItem = {
  itemCode: string
  itemName: string
  uomCode: string
  canExpire: boolean
  requestQty: number
  batches: SeedBatch[]
}

const SEED_ACTOR = 'DEVSEED'

const WAREHOUSES = ['Kingston Central Depot', 'Montego Bay Relief Hub']

const ITEMS: SeedItem[] = [
  {
    itemCode: 'WATER-5L',
    itemName: 'Bottled water 5L',
    uomCode: 'EA',
    canExpire: true,
    requestQty: 150,
    batches: [
      { warehouse: WAREHOUSES[0], batchNo: 'WTR-001', batchDate: '2026-01-10', expiryDate: '2027-01-10', usableQty: 80 },
      { warehouse: WAREHOUSES[0], batchNo: 'WTR-002', batchDate: '2026-03-02', expiryDate: '2027-06-30', usableQty: 120 },
      { warehouse: WAREHOUSES[1], batchNo: 'WTR-101', batchDate: '2026-02-15', expiryDate: '2027-01-10', usableQty: 40 }
    ]
  },
  {
    itemCode: 'TARP-4X6',
    itemName: 'Tarpaulin 4m x 6m',
    uomCode: 'EA',
    canExpire: false,
    requestQty: 60,
    batches: [
      { warehouse: WAREHOUSES[0], batchNo: 'TRP-001', batchDate: '2025-11-20', expiryDate: null, usableQty: 25 },
      { warehouse: WAREHOUSES[1], batchNo: 'TRP-101', batchDate: '2026-04-01', expiryDate: null, usableQty: 70 }
    ]
  }
]

function makeLogger(level: LogLevel) {
  const order: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 }
  const min = order[level] ?? order.info
  const log = (l: LogLevel) => (msg: string, extra?: unknown) => {
    if (order[l] < min) return
    const line = `[dev-seed] ${l.toUpperCase()} ${msg}`
    if (extra === undefined) {
      console.log(line)
    } else {
      console.log(line, extra)
    }
  }
  return { debug: log('debug'), info: log('info'), warn: log('warn'), error: log('error') }
}

function parseLogLevel(value: string | undefined): LogLevel {
  return value === 'debug' || value === 'warn' || value === 'error' ? value : 'info'
}

const logger = makeLogger(parseLogLevel(process.env.LOG_LEVEL))

async function insertReturningId(client: PoolClient, text: string, params: unknown[]): Promise<number> {
  const res = await client.query<{ id: number }>(text, params)
  return res.rows[0].id
}

async function seed(client: PoolClient) {
  const warehouseIds = new Map<string, number>()
  for (const name of WAREHOUSES) {
    const id = await insertReturningId(
      client,
      `INSERT INTO warehouse (warehouse_name, create_by_id, update_by_id)
       VALUES ($1, $2, $2)
       ON CONFLICT (warehouse_name) DO UPDATE SET warehouse_name = EXCLUDED.warehouse_name
       RETURNING warehouse_id AS id`,
      [name, SEED_ACTOR]
    )
    warehouseIds.set(name, id)
  }

  const requestId = await insertReturningId(
    client,
    `INSERT INTO reliefrqst (create_by_id, update_by_id) VALUES ($1, $1) RETURNING reliefrqst_id AS id`,
    [SEED_ACTOR]
  )

  for (const item of ITEMS) {
    const itemId = await insertReturningId(
      client,
      `INSERT INTO item (item_code, item_name, default_uom_code, can_expire_flag, create_by_id, update_by_id)
       VALUES ($1, $2, $3, $4, $5, $5)
       ON CONFLICT (item_code) DO UPDATE SET item_name = EXCLUDED.item_name
       RETURNING item_id AS id`,
      [item.itemCode, item.itemName, item.uomCode, item.canExpire, SEED_ACTOR]
    )

    for (const batch of item.batches) {
      const inventoryId = warehouseIds.get(batch.warehouse)
      if (inventoryId === undefined) throw new Error(`Unknown seed warehouse ${batch.warehouse}`)
      await client.query(
        `INSERT INTO inventory (inventory_id, item_id, usable_qty, uom_code, create_by_id, update_by_id)
         VALUES ($1, $2, 0, $3, $4, $4)
         ON CONFLICT (inventory_id, item_id) DO NOTHING`,
        [inventoryId, itemId, item.uomCode, SEED_ACTOR]
      )
      const inserted = await client.query(
        `INSERT INTO itembatch (
           inventory_id, item_id, batch_no, batch_date, expiry_date, usable_qty, uom_code, create_by_id, update_by_id
         ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $8)
         ON CONFLICT (inventory_id, item_id, batch_no) DO NOTHING
         RETURNING batch_id`,
        [inventoryId, itemId, batch.batchNo, batch.batchDate, batch.expiryDate, batch.usableQty, item.uomCode, SEED_ACTOR]
      )
      if (inserted.rowCount === 0) {
        logger.debug(`batch ${batch.batchNo} already present`)
        continue
      }
      await client.query(
        `UPDATE inventory
            SET usable_qty = usable_qty + $3, version_nbr = version_nbr + 1, update_by_id = $4, update_dtime = now()
          WHERE inventory_id = $1 AND item_id = $2`,
        [inventoryId, itemId, batch.usableQty, SEED_ACTOR]
      )
    }

    await client.query(
      `INSERT INTO reliefrqst_item (reliefrqst_id, item_id, request_qty, create_by_id, update_by_id)
       VALUES ($1, $2, $3, $4, $4)`,
      [requestId, itemId, item.requestQty, SEED_ACTOR]
    )
    logger.debug(`seeded item ${item.itemCode}`, { itemId, batches: item.batches.length })
  }

  const packageId = await insertReturningId(
    client,
    `INSERT INTO reliefpkg (reliefrqst_id, create_by_id, update_by_id) VALUES ($1, $2, $2) RETURNING reliefpkg_id AS id`,
    [requestId, SEED_ACTOR]
  )
  return { requestId, packageId }
}

async function main() {
  const { requestId, packageId } = await withTransaction(seed)
  logger.info(`relief request ${requestId}, package ${packageId}`)

  const token = signAccessToken(
    { sub: 'dev-officer', userName: 'dev.officer', role: 'logistics_officer' },
    8 * 60 * 60
  )
  logger.info('dev access token (8h):')
  console.log(token)
}

main()
  .catch((error: unknown) => {
    logger.error('seed failed', error)
    process.exitCode = 1
  })
  .finally(() => pool.end())
