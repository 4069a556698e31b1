export type IssuanceOrder = 'FIFO' | 'FEFO';

export type ExpiryStatus = 'expired' | 'expiring_soon' | 'ok';

/** Relief request line status: Requested, Partly allocated, Fully allocated, Denied. */
export type LineStatusCode = 'R' | 'P' | 'F' | 'D';

/** Relief package status: drAft, being Prepared, Verified, Dispatched. */
export type PackageStatusCode = 'A' | 'P' | 'V' | 'D';

export type ItemRecord = {
  itemId: number;
  itemCode: string;
  itemName: string;
  defaultUomCode: string;
  canExpire: boolean;
  isBatched: boolean;
};

export type BatchRecord = {
  batchId: number;
  inventoryId: number;
  warehouseId: number;
  warehouseName: string;
  itemId: number;
  batchNo: string;
  /** YYYY-MM-DD */
  batchDate: string;
  /** YYYY-MM-DD */
  expiryDate: string | null;
  usableQty: number;
  reservedQty: number;
  uomCode: string;
  sizeSpec: string | null;
  versionNbr: number;
};

export type AllocatableBatch = Omit<BatchRecord, 'versionNbr'> & {
  releasedQty: number;
  availableQty: number;
  priorityGroup: number;
  daysToExpiry: number | null;
  expiryStatus: ExpiryStatus | null;
};

export type WarehouseSummary = {
  warehouseId: number;
  warehouseName: string;
  batchCount: number;
  totalAvailable: number;
};

export type BatchListing = {
  itemId: number;
  itemCode: string;
  itemName: string;
  issuanceOrder: IssuanceOrder;
  canExpire: boolean;
  isBatched: boolean;
  remainingQty: number;
  totalAvailable: number;
  shortfall: number;
  canFulfill: boolean;
  batches: AllocatableBatch[];
  warehouses: WarehouseSummary[];
};

/** batchId -> quantity */
export type BatchQuantities = ReadonlyMap<number, number>;

export type InventoryRecord = {
  inventoryId: number;
  itemId: number;
  usableQty: number;
  reservedQty: number;
  versionNbr: number;
};

export type ReliefPackageRecord = {
  packageId: number;
  reliefRequestId: number;
  statusCode: PackageStatusCode;
  versionNbr: number;
};

export type RequestLineRecord = {
  reliefRequestId: number;
  itemId: number;
  requestQty: number;
  issueQty: number;
  statusCode: LineStatusCode;
  versionNbr: number;
};

export type PackageItemKey = {
  packageId: number;
  inventoryId: number;
  batchId: number;
  itemId: number;
};

export type PackageItemRecord = PackageItemKey & {
  itemQty: number;
  uomCode: string;
  versionNbr: number;
  updateById: string | null;
  updateDtime: Date | null;
};
