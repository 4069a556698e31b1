export { AllocationSession, type AppliedAllocation, type ApplyResult, type CommitLine } from './allocationSession';

export { buildBatchListing, describeExpiry, isAllocatable, type BatchListingOptions } from './batchListing';

export { validatePickOrder, type PickOrderResult } from './pickOrder';

export { deriveLineStatus } from './lineStatus';

export { ALLOCATION_ERROR, AllocationError, isAllocationError, type AllocationErrorCode } from './errors';

export { releaseOwnReservations, quantitiesFromRecord, quantitiesToRecord } from './internal/reservationRelease';

export { planPackageItemUpsert, type UpsertPlan } from './internal/upsertPlan';

export { createPgAllocationStore } from './internal/pgAllocationStore';

export type { AllocationDataSource, AllocationStore } from './store';

export type {
  AllocatableBatch,
  BatchListing,
  BatchRecord,
  ExpiryStatus,
  IssuanceOrder,
  ItemRecord,
  LineStatusCode,
  PackageItemRecord,
  PackageStatusCode,
  WarehouseSummary
} from './types';
