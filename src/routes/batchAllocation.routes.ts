import { Router, type Request, type Response } from 'express';
import type { AllocationDataSource } from '../domains/allocation';
import {
  allocationErrorMap,
  allocationPgErrorMapping,
  asyncErrorHandler,
  idParam,
  validateIdParam
} from '../middleware/validation';
import { batchQuerySchema, packageAllocationSchema } from '../schemas/batchAllocation.schema';
import { queryItemBatches } from '../services/batchQuery.service';
import {
  getPackageAllocations,
  previewPackageAllocations,
  savePackageAllocations
} from '../services/packageAllocation.service';

export function createBatchAllocationRouter(source: AllocationDataSource) {
  const router = Router();

  router.get(
    '/items/:itemId/batches',
    validateIdParam('itemId'),
    asyncErrorHandler(
      async (req: Request, res: Response) => {
        const parsed = batchQuerySchema.safeParse(req.query);
        if (!parsed.success) {
          return res.status(400).json({ error: 'Invalid query parameters.', details: parsed.error.flatten() });
        }
        const listing = await queryItemBatches(source.store, {
          itemId: idParam(req, 'itemId'),
          remainingQty: parsed.data.remaining_qty,
          requiredUom: parsed.data.required_uom ?? null,
          allocatedBatchIds: parsed.data.allocated_batch_ids,
          currentAllocations: parsed.data.current_allocations,
          packageId: parsed.data.package_id ?? null
        });
        return res.json(listing);
      },
      allocationErrorMap,
      allocationPgErrorMapping
    )
  );

  router.get(
    '/relief-packages/:packageId/allocations',
    validateIdParam('packageId'),
    asyncErrorHandler(
      async (req: Request, res: Response) => {
        const allocations = await getPackageAllocations(source.store, idParam(req, 'packageId'));
        return res.json(allocations);
      },
      allocationErrorMap,
      allocationPgErrorMapping
    )
  );

  router.post(
    '/relief-packages/:packageId/allocations/validate',
    validateIdParam('packageId'),
    asyncErrorHandler(
      async (req: Request, res: Response) => {
        const parsed = packageAllocationSchema.safeParse(req.body);
        if (!parsed.success) {
          return res.status(400).json({ error: 'Invalid request body.', details: parsed.error.flatten() });
        }
        const preview = await previewPackageAllocations(source.store, idParam(req, 'packageId'), parsed.data);
        return res.json(preview);
      },
      allocationErrorMap,
      allocationPgErrorMapping
    )
  );

  router.put(
    '/relief-packages/:packageId/allocations',
    validateIdParam('packageId'),
    asyncErrorHandler(
      async (req: Request, res: Response) => {
        if (!req.auth) {
          return res.status(401).json({ error: 'Missing access token.' });
        }
        const parsed = packageAllocationSchema.safeParse(req.body);
        if (!parsed.success) {
          return res.status(400).json({ error: 'Invalid request body.', details: parsed.error.flatten() });
        }
        const outcome = await savePackageAllocations(source, idParam(req, 'packageId'), parsed.data, {
          userId: req.auth.userId,
          userName: req.auth.userName
        });
        return res.json(outcome);
      },
      allocationErrorMap,
      allocationPgErrorMapping
    )
  );

  return router;
}
