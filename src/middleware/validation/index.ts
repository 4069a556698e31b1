export { allocationErrorMap, allocationPgErrorMapping, asyncErrorHandler, createErrorResponse, type ErrorHandlerMap } from './errors';
export { idParam, validateIdParam } from './schema';
