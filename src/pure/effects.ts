/**
 * EFFECTS LAYER
 *
 * This layer handles all external IO. Implementations are thin wrappers
 * that just move data in/out. No business logic whatsoever.
 *
 * The interfaces sit at the level the core talks in ("add quantity to this
 * cart line", "create this order") rather than "execute arbitrary SQL", so
 * tests can implement them with a few lines instead of a database.
 */

import {CartLine, CatalogItem, ItemKind, ItemRef, Order, User} from '../domain';
import {NotificationPayload, SessionRecord} from '../types';
import {MissingItemAlert, NewUser, OrderDraft} from './types';

// ============================================================================
// Effect Interfaces
// ============================================================================

export interface CatalogRepository {
  listActive(kind: ItemKind): Promise<CatalogItem[]>;
  // No status filter: deactivated items stay resolvable
  getByRef(ref: ItemRef): Promise<CatalogItem | null>;
  /** Keyed by itemRefKey; items that no longer exist are absent. */
  getByRefs(refs: ItemRef[]): Promise<Map<string, CatalogItem>>;
}

export interface CartRepository {
  /** Ordered by cart line id, i.e. insertion order. */
  listByUser(userId: number): Promise<CartLine[]>;
  getById(cartLineId: number): Promise<CartLine | null>;
  /** Inserts the line or increments the quantity of the existing one. */
  addQuantity(userId: number, item: ItemRef, quantity: number): Promise<CartLine>;
  deleteById(cartLineId: number): Promise<void>;
  clearForUser(userId: number): Promise<number>;
}

export interface OrderRepository {
  create(draft: OrderDraft): Promise<Order>;
  /** Most recent first. */
  listByUser(userId: number): Promise<Order[]>;
}

export type TransactionEffects = {
  readonly catalog: CatalogRepository;
  readonly carts: CartRepository;
  readonly orders: OrderRepository;
};

export interface TransactionRunner {
  /**
   * Runs work in a single transaction holding the user's exclusive lock.
   * Commits when work resolves and rolls back when it rejects.
   */
  runExclusive<T>(userId: number, work: (tx: TransactionEffects) => Promise<T>): Promise<T>;
}

export interface UserRepository {
  getById(id: number): Promise<User | null>;
  getByMobile(mobile: string): Promise<User | null>;
  getByEmail(email: string): Promise<User | null>;
  create(user: NewUser): Promise<User>;
}

export interface PasswordHasher {
  hash(password: string): Promise<string>;
  verify(password: string, passwordHash: string): Promise<boolean>;
}

export interface SessionStore {
  create(record: SessionRecord): Promise<string>;
  get(sessionId: string): Promise<SessionRecord | null>;
  destroy(sessionId: string): Promise<void>;
}

export interface NotificationService {
  sendEmail(payload: NotificationPayload): Promise<void>;
}

export interface MonitoringService {
  sendAlerts(alerts: MissingItemAlert[]): Promise<void>;
}

// ============================================================================
// Combined Dependencies
//
// Group all effects together. This makes it easy to provide real or test
// implementations. No DI framework needed - just an object.
// ============================================================================

export type AppEffects = {
  readonly catalog: CatalogRepository;
  readonly carts: CartRepository;
  readonly orders: OrderRepository;
  readonly transactions: TransactionRunner;
  readonly users: UserRepository;
  readonly passwords: PasswordHasher;
  readonly sessions: SessionStore;
  readonly notifications: NotificationService;
  readonly monitoring: MonitoringService;
};
