/**
 * HTTP API Routes
 *
 * Thin controllers - validate input, call the operator, return results.
 * No business logic here. The invoking identity comes from `x-caller`.
 */

import { Router, type Request, type Response, type NextFunction } from 'express';
import { invocation, type InvocationContext } from '../boundaries/principal.js';
import { isMarketplaceError, ValidationError, type MarketplaceErrorKind } from '../boundaries/errors.js';
import type { MarketplaceOperator } from '../operator/operator.js';
import type { Logger } from '../utils/logger.js';
import {
  validateCart,
  validateId,
  validateMetadata,
  validateObject,
  validatePrincipal,
} from './validation.js';

type Handler = (req: Request, res: Response) => Promise<void>;

function callerOf(req: Request): InvocationContext {
  const header = req.header('x-caller');
  if (!header) {
    throw new ValidationError('x-caller header is required');
  }
  return invocation(header);
}

/**
 * Forward rejections to the error middleware (Express 4 does not).
 */
function handle(handler: Handler) {
  return (req: Request, res: Response, next: NextFunction) => {
    handler(req, res).catch(next);
  };
}

// =============================================================================
// ROUTE FACTORY
// =============================================================================

export function createRoutes(operator: MarketplaceOperator, logger: Logger): Router {
  const router = Router();

  // ===========================================================================
  // Access control
  // ===========================================================================

  router.post('/admin', handle(async (req, res) => {
    const body = validateObject(req.body, 'body');
    const admin = validatePrincipal(body.admin, 'admin');
    await operator.setAdmin(callerOf(req), admin);
    res.json({ ok: true });
  }));

  router.post('/fee-destination', handle(async (req, res) => {
    const body = validateObject(req.body, 'body');
    const destination = validatePrincipal(body.destination, 'destination');
    await operator.setFeeDestination(callerOf(req), destination);
    res.json({ ok: true });
  }));

  router.get('/settings', handle(async (_req, res) => {
    res.json({
      admin: await operator.getAdmin(),
      feeDestination: await operator.getFeeDestination(),
    });
  }));

  // ===========================================================================
  // Products
  // ===========================================================================

  router.post('/products', handle(async (req, res) => {
    const body = validateObject(req.body, 'body');
    const producer = validatePrincipal(body.producer, 'producer');
    const metadata = validateMetadata(body.metadata);

    const productId = await operator.createProduct(callerOf(req), producer, metadata);
    logger.info({ operation: 'createProduct', productId }, 'Product listed');
    res.status(201).json({ productId });
  }));

  router.get('/products/:id', handle(async (req, res) => {
    const productId = validateId(req.params.id, 'id');
    const product = await operator.getProduct(productId);
    if (!product) {
      res.status(404).json({ error: 'Product not found' });
      return;
    }
    res.json({ productId, ...product });
  }));

  // ===========================================================================
  // Affiliate requests
  // ===========================================================================

  router.post('/requests', handle(async (req, res) => {
    const body = validateObject(req.body, 'body');
    const productId = validateId(body.productId, 'productId');
    const publisher = validatePrincipal(body.publisher, 'publisher');

    const requestId = await operator.createRequest(callerOf(req), productId, publisher);
    res.status(201).json({ requestId });
  }));

  router.get('/requests/:id', handle(async (req, res) => {
    const requestId = validateId(req.params.id, 'id');
    const request = await operator.getRequest(requestId);
    if (!request) {
      res.status(404).json({ error: 'Request not found' });
      return;
    }
    res.json({ requestId, ...request });
  }));

  router.post('/requests/:id/cancel', handle(async (req, res) => {
    const requestId = validateId(req.params.id, 'id');
    const body = validateObject(req.body, 'body');
    const publisher = validatePrincipal(body.publisher, 'publisher');
    res.json({ requestId: await operator.cancelRequest(callerOf(req), requestId, publisher) });
  }));

  router.post('/requests/:id/accept', handle(async (req, res) => {
    const requestId = validateId(req.params.id, 'id');
    const body = validateObject(req.body, 'body');
    const producer = validatePrincipal(body.producer, 'producer');
    res.json({ requestId: await operator.acceptRequest(callerOf(req), requestId, producer) });
  }));

  router.post('/requests/:id/reject', handle(async (req, res) => {
    const requestId = validateId(req.params.id, 'id');
    const body = validateObject(req.body, 'body');
    const producer = validatePrincipal(body.producer, 'producer');
    res.json({ requestId: await operator.rejectRequest(callerOf(req), requestId, producer) });
  }));

  // ===========================================================================
  // Purchases
  // ===========================================================================

  router.post('/purchases', handle(async (req, res) => {
    const body = validateObject(req.body, 'body');
    const purchaser = validatePrincipal(body.purchaser, 'purchaser');
    const shop = validatePrincipal(body.shop, 'shop');
    const cart = validateCart(body.cart);

    const receipt = await operator.purchase(callerOf(req), purchaser, shop, cart);
    res.status(201).json(receipt);
  }));

  // ===========================================================================
  // Health check
  // ===========================================================================

  router.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok', timestamp: Date.now() });
  });

  return router;
}

// =============================================================================
// ERROR HANDLER MIDDLEWARE
// =============================================================================

const STATUS_BY_KIND: Record<MarketplaceErrorKind, number> = {
  AUTHORIZATION: 403,
  VALIDATION: 400,
  NOT_FOUND: 404,
  STATE_CONFLICT: 409,
  TRANSFER: 402,
};

export function statusForError(err: Error): number {
  return isMarketplaceError(err) ? STATUS_BY_KIND[err.kind] : 500;
}

export function errorHandler(logger: Logger) {
  return (err: Error, _req: Request, res: Response, _next: NextFunction) => {
    if (isMarketplaceError(err)) {
      res.status(statusForError(err)).json({ error: err.message, kind: err.kind, code: err.code });
      return;
    }

    logger.error({ error: err }, 'Unhandled error');
    res.status(500).json({ error: 'Internal server error' });
  };
}
