/**
 * Credit Decision Engine - API Module Export
 */

export { createOriginationRoutes, OriginationRouteDependencies } from './origination.routes';
export { LoanApplicationSchema, IdParamSchema } from './schemas';
