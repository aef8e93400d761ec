/**
 * Product Catalog Store
 *
 * Authoritative storage for product attributes, affiliate requests, the
 * duplicate-prevention membership set, the request counter and the two
 * access-control singletons.
 *
 * Reads are open. Writes go through `writer(caller)`, which only the
 * operator identity can obtain.
 */

import type { Principal } from '../boundaries/principal.js';
import { AuthorizationError, NotFoundError, StateConflict } from '../boundaries/errors.js';
import type { AffiliateRequest, Product } from './types.js';

// =============================================================================
// STORE INTERFACE
// =============================================================================

export interface CatalogReader {
  getProduct(productId: number): Promise<Product | null>;
  getRequest(requestId: number): Promise<AffiliateRequest | null>;

  /** Whether an active (product, publisher) membership exists. */
  isRequested(productId: number, publisher: Principal): Promise<boolean>;

  /** Id of the request holding the (product, publisher) membership, if any. */
  getActiveRequestId(productId: number, publisher: Principal): Promise<number | null>;

  getAdmin(): Promise<Principal>;
  getFeeDestination(): Promise<Principal>;
  getLastRequestId(): Promise<number>;
}

export interface CatalogWriter {
  /** Fails with StateConflict if the id is already taken. */
  insertProduct(productId: number, product: Product): Promise<void>;

  /** Fails with StateConflict if the id is already taken. */
  insertRequest(requestId: number, request: AffiliateRequest): Promise<void>;

  /** Fails with NotFoundError if the request does not exist. */
  updateRequest(requestId: number, request: AffiliateRequest): Promise<void>;

  deleteRequest(requestId: number): Promise<void>;

  /** Bind the (product, publisher) membership to `requestId`. */
  addMembership(productId: number, publisher: Principal, requestId: number): Promise<void>;
  removeMembership(productId: number, publisher: Principal): Promise<void>;

  setAdmin(admin: Principal): Promise<void>;
  setFeeDestination(destination: Principal): Promise<void>;

  /**
   * Increment the request counter and return the new value.
   * The counter starts at 0, so the first id handed out is 1.
   */
  nextRequestId(): Promise<number>;
}

export interface ProductCatalogStore extends CatalogReader {
  /**
   * Obtain write access.
   * Throws AuthorizationError unless caller is the operator identity.
   */
  writer(caller: Principal): CatalogWriter;
}

/**
 * Backends that can be rolled back in-process.
 */
export interface Snapshottable<TSnapshot> {
  snapshot(): TSnapshot;
  restore(snapshot: TSnapshot): void;
}

export function membershipKey(productId: number, publisher: Principal): string {
  return `${productId}:${publisher}`;
}

// =============================================================================
// IN-MEMORY IMPLEMENTATION
// =============================================================================

export interface CatalogState {
  products: Map<number, Product>;
  requests: Map<number, AffiliateRequest>;
  memberships: Map<string, number>;
  admin: Principal;
  feeDestination: Principal;
  lastRequestId: number;
}

/**
 * In-memory catalog for tests and local development.
 *
 * WARNING: Data is lost on restart. Use PostgresCatalogStore in production.
 */
export class InMemoryCatalogStore
  implements ProductCatalogStore, Snapshottable<CatalogState>
{
  private state: CatalogState;

  constructor(
    private readonly operator: Principal,
    bootstrap: Principal
  ) {
    this.state = {
      products: new Map(),
      requests: new Map(),
      memberships: new Map(),
      admin: bootstrap,
      feeDestination: bootstrap,
      lastRequestId: 0,
    };
  }

  async getProduct(productId: number): Promise<Product | null> {
    const product = this.state.products.get(productId);
    return product ? { ...product } : null;
  }

  async getRequest(requestId: number): Promise<AffiliateRequest | null> {
    const request = this.state.requests.get(requestId);
    return request ? { ...request } : null;
  }

  async isRequested(productId: number, publisher: Principal): Promise<boolean> {
    return this.state.memberships.has(membershipKey(productId, publisher));
  }

  async getActiveRequestId(productId: number, publisher: Principal): Promise<number | null> {
    return this.state.memberships.get(membershipKey(productId, publisher)) ?? null;
  }

  async getAdmin(): Promise<Principal> {
    return this.state.admin;
  }

  async getFeeDestination(): Promise<Principal> {
    return this.state.feeDestination;
  }

  async getLastRequestId(): Promise<number> {
    return this.state.lastRequestId;
  }

  writer(caller: Principal): CatalogWriter {
    if (caller !== this.operator) {
      throw new AuthorizationError(`${caller} may not write to the catalog`);
    }
    return new InMemoryCatalogWriter(this.state);
  }

  snapshot(): CatalogState {
    return structuredClone(this.state);
  }

  restore(snapshot: CatalogState): void {
    // Writers hold a reference to the state object, so mutate in place
    this.state.products = snapshot.products;
    this.state.requests = snapshot.requests;
    this.state.memberships = snapshot.memberships;
    this.state.admin = snapshot.admin;
    this.state.feeDestination = snapshot.feeDestination;
    this.state.lastRequestId = snapshot.lastRequestId;
  }

  // For testing: count stored records
  counts(): { products: number; requests: number; memberships: number } {
    return {
      products: this.state.products.size,
      requests: this.state.requests.size,
      memberships: this.state.memberships.size,
    };
  }
}

class InMemoryCatalogWriter implements CatalogWriter {
  constructor(private readonly state: CatalogState) {}

  async insertProduct(productId: number, product: Product): Promise<void> {
    if (this.state.products.has(productId)) {
      throw new StateConflict(`Product ${productId} already exists`);
    }
    this.state.products.set(productId, { ...product });
  }

  async insertRequest(requestId: number, request: AffiliateRequest): Promise<void> {
    if (this.state.requests.has(requestId)) {
      throw new StateConflict(`Request ${requestId} already exists`);
    }
    this.state.requests.set(requestId, { ...request });
  }

  async updateRequest(requestId: number, request: AffiliateRequest): Promise<void> {
    if (!this.state.requests.has(requestId)) {
      throw new NotFoundError('request', requestId);
    }
    this.state.requests.set(requestId, { ...request });
  }

  async deleteRequest(requestId: number): Promise<void> {
    this.state.requests.delete(requestId);
  }

  async addMembership(productId: number, publisher: Principal, requestId: number): Promise<void> {
    this.state.memberships.set(membershipKey(productId, publisher), requestId);
  }

  async removeMembership(productId: number, publisher: Principal): Promise<void> {
    this.state.memberships.delete(membershipKey(productId, publisher));
  }

  async setAdmin(admin: Principal): Promise<void> {
    this.state.admin = admin;
  }

  async setFeeDestination(destination: Principal): Promise<void> {
    this.state.feeDestination = destination;
  }

  async nextRequestId(): Promise<number> {
    this.state.lastRequestId += 1;
    return this.state.lastRequestId;
  }
}
