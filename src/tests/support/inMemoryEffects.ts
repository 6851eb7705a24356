/**
 * In-process implementation of the effect interfaces.
 *
 * Transactions are serialized through a single lock and roll back by
 * restoring a copy of the state taken when they started, which is enough to
 * observe atomicity and the per-user exclusion from the outside.
 */

import {CartLine, CatalogItem, ItemRef, Order, User} from '../../domain';
import {NotificationPayload, SessionRecord} from '../../types';
import {MissingItemAlert, NewUser, OrderDraft} from '../../pure/types';
import {
  AppEffects,
  CartRepository,
  CatalogRepository,
  MonitoringService,
  NotificationService,
  OrderRepository,
  PasswordHasher,
  SessionStore,
  TransactionEffects,
  TransactionRunner,
  UserRepository,
} from '../../pure/effects';
import {itemRefKey, sameItem} from '../../pure/itemRef';

type State = {
  catalog: Map<string, CatalogItem>;
  cart: CartLine[];
  orders: Order[];
  users: User[];
  sessions: Map<string, SessionRecord>;
  sequence: number;
};

export type FailurePoint = 'orders.create' | 'carts.clearForUser' | 'carts.addQuantity';

const EPOCH = Date.UTC(2026, 0, 1);

export class InMemoryEffects implements AppEffects {
  readonly sentEmails: NotificationPayload[] = [];
  readonly sentAlerts: MissingItemAlert[][] = [];

  private state: State = {
    catalog: new Map(),
    cart: [],
    orders: [],
    users: [],
    sessions: new Map(),
    sequence: 0,
  };
  private lock: Promise<unknown> = Promise.resolve();
  private failures = new Set<FailurePoint>();

  // ========== Test helpers ==========

  putCatalogItem(item: CatalogItem): void {
    this.state.catalog.set(itemRefKey(item.ref), item);
  }

  setFinalPrice(ref: ItemRef, finalPrice: number): void {
    const item = this.state.catalog.get(itemRefKey(ref));
    if (!item) throw new Error(`No catalog item ${itemRefKey(ref)}`);
    this.state.catalog.set(itemRefKey(ref), {...item, finalPrice});
  }

  deleteCatalogItem(ref: ItemRef): void {
    this.state.catalog.delete(itemRefKey(ref));
  }

  putUser(user: User): void {
    this.state.users = [...this.state.users, user];
  }

  cartOf(userId: number): CartLine[] {
    return this.state.cart.filter(line => line.userId === userId);
  }

  allOrders(): Order[] {
    return [...this.state.orders];
  }

  failOnce(point: FailurePoint): void {
    this.failures.add(point);
  }

  private nextId(): number {
    this.state.sequence += 1;
    return this.state.sequence;
  }

  private maybeFail(point: FailurePoint): void {
    if (this.failures.delete(point)) {
      throw new Error(`Injected failure in ${point}`);
    }
  }

  // ========== Repositories ==========

  readonly catalog: CatalogRepository = {
    listActive: async (kind) =>
      [...this.state.catalog.values()]
        .filter(item => item.ref.kind === kind && item.status === 'active')
        .sort((a, b) => a.ref.id - b.ref.id),
    getByRef: async (ref) => this.state.catalog.get(itemRefKey(ref)) ?? null,
    getByRefs: async (refs) => {
      const found = new Map<string, CatalogItem>();
      for (const ref of refs) {
        const item = this.state.catalog.get(itemRefKey(ref));
        if (item) found.set(itemRefKey(ref), item);
      }
      return found;
    },
  };

  readonly carts: CartRepository = {
    listByUser: async (userId) =>
      this.state.cart.filter(line => line.userId === userId).sort((a, b) => a.id - b.id),
    getById: async (cartLineId) => this.state.cart.find(line => line.id === cartLineId) ?? null,
    addQuantity: async (userId, item, quantity) => {
      this.maybeFail('carts.addQuantity');
      const existing = this.state.cart.find(line => line.userId === userId && sameItem(line.item, item));
      const line: CartLine = existing
        ? {...existing, quantity: existing.quantity + quantity}
        : {id: this.nextId(), userId, item, quantity, addedAt: new Date(EPOCH)};
      this.state.cart = [...this.state.cart.filter(other => other.id !== line.id), line];
      return line;
    },
    deleteById: async (cartLineId) => {
      this.state.cart = this.state.cart.filter(line => line.id !== cartLineId);
    },
    clearForUser: async (userId) => {
      this.maybeFail('carts.clearForUser');
      const before = this.state.cart.length;
      this.state.cart = this.state.cart.filter(line => line.userId !== userId);
      return before - this.state.cart.length;
    },
  };

  readonly orders: OrderRepository = {
    create: async (draft: OrderDraft) => {
      const orderId = this.nextId();
      const order: Order = {
        id: orderId,
        userId: draft.userId,
        totalAmount: draft.totalAmount,
        paymentMode: draft.paymentMode,
        deliveryLocation: draft.deliveryLocation,
        createdAt: new Date(EPOCH + orderId * 60_000),
        status: draft.status,
        lines: draft.lines.map(line => ({
          id: this.nextId(),
          orderId,
          item: line.item,
          quantity: line.quantity,
          unitPrice: line.unitPrice,
        })),
      };
      // Written before the failure check so a rollback has something to undo
      this.state.orders = [...this.state.orders, order];
      this.maybeFail('orders.create');
      return order;
    },
    listByUser: async (userId) =>
      this.state.orders
        .filter(order => order.userId === userId)
        .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime() || b.id - a.id),
  };

  readonly transactions: TransactionRunner = {
    runExclusive: <T>(_userId: number, work: (tx: TransactionEffects) => Promise<T>): Promise<T> => {
      const run = this.lock.then(async () => {
        const snapshot = structuredClone(this.state);
        try {
          return await work({catalog: this.catalog, carts: this.carts, orders: this.orders});
        } catch (error) {
          this.state = snapshot;
          throw error;
        }
      });
      this.lock = run.catch(() => undefined);
      return run;
    },
  };

  readonly users: UserRepository = {
    getById: async (id) => this.state.users.find(user => user.id === id) ?? null,
    getByMobile: async (mobile) => this.state.users.find(user => user.mobile === mobile) ?? null,
    getByEmail: async (email) => this.state.users.find(user => user.email === email) ?? null,
    create: async (newUser: NewUser) => {
      const user: User = {...newUser, id: this.nextId(), createdAt: new Date(EPOCH)};
      this.state.users = [...this.state.users, user];
      return user;
    },
  };

  readonly passwords: PasswordHasher = {
    hash: async (password) => `hashed:${password}`,
    verify: async (password, passwordHash) => passwordHash === `hashed:${password}`,
  };

  readonly sessions: SessionStore = {
    create: async (record) => {
      const sessionId = `session-${this.nextId()}`;
      this.state.sessions.set(sessionId, record);
      return sessionId;
    },
    get: async (sessionId) => this.state.sessions.get(sessionId) ?? null,
    destroy: async (sessionId) => {
      this.state.sessions.delete(sessionId);
    },
  };

  readonly notifications: NotificationService = {
    sendEmail: async (payload) => {
      this.sentEmails.push(payload);
    },
  };

  readonly monitoring: MonitoringService = {
    sendAlerts: async (alerts) => {
      this.sentAlerts.push(alerts);
    },
  };
}

export function catalogItem(ref: ItemRef, finalPrice: number, overrides: Partial<CatalogItem> = {}): CatalogItem {
  return {
    ref,
    name: `${ref.kind} ${ref.id}`,
    photo: null,
    description: null,
    originalPrice: finalPrice,
    discount: 0,
    finalPrice,
    status: 'active',
    ...overrides,
  };
}

export function testUser(id: number, overrides: Partial<User> = {}): User {
  return {
    id,
    fullName: `User ${id}`,
    mobile: `55500${id}`,
    email: `user${id}@example.com`,
    location: 'Test Street 1',
    latitude: null,
    longitude: null,
    passwordHash: 'hashed:test-password',
    createdAt: new Date(EPOCH),
    ...overrides,
  };
}
