/**
 * PRODUCTION EFFECTS IMPLEMENTATION
 *
 * This file contains the real implementations that connect to actual services:
 * - PostgreSQL for the catalog, carts, orders and users
 * - Redis for sessions
 * - SMTP (nodemailer) for order confirmations
 * - CloudWatch/SNS for monitoring of dropped cart lines
 */
import {CartLine, CatalogItem, ItemKind, ItemRef, Order, OrderLine, User} from '../domain';
import {NotificationPayload, SessionRecord} from '../types';
import {MissingItemAlert, NewUser, OrderDraft} from '../pure/types';
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
} from '../pure/effects';
import {isItemKind, itemRef, itemRefKey, matchItemRef} from '../pure/itemRef';
import {AwsConfig, EmailConfig, ProductionConfig} from './types';
import {loadConfigFromEnv} from './config';
import {EffectsError} from './EffectsError';
import {Pool, PoolClient} from 'pg';
import {createClient} from 'redis';
import nodemailer, {Transporter} from 'nodemailer';
import {CloudWatchClient, PutMetricDataCommand} from '@aws-sdk/client-cloudwatch';
import {PublishCommand, SNSClient} from '@aws-sdk/client-sns';
import {randomBytes, randomUUID, scrypt, timingSafeEqual} from 'node:crypto';
import {readFile} from 'node:fs/promises';
import path from 'node:path';
import {z} from 'zod';

type RedisClient = ReturnType<typeof createClient>;

// Namespace of the advisory locks taken per user around cart mutations and checkout
const CART_LOCK_NAMESPACE = 7001;

const SCHEMA_PATH = path.resolve(__dirname, '../../db/schema.sql');

// ============================================================================
// Connections
//
// Repositories run their queries through a Connection so the same code works
// on a pooled client or on the client of an open transaction.
// ============================================================================

interface Connection {
  withClient<T>(work: (client: PoolClient) => Promise<T>): Promise<T>;
  inTransaction<T>(work: (client: PoolClient) => Promise<T>): Promise<T>;
}

async function transaction<T>(client: PoolClient, work: () => Promise<T>): Promise<T> {
  await client.query('BEGIN');
  try {
    const result = await work();
    await client.query('COMMIT');
    return result;
  } catch (error) {
    try {
      await client.query('ROLLBACK');
    } catch (rollbackError) {
      throw new EffectsError([error, rollbackError]);
    }
    throw error;
  }
}

function pooledConnection(pool: Pool): Connection {
  return {
    async withClient<T>(work: (client: PoolClient) => Promise<T>): Promise<T> {
      const client = await pool.connect();
      try {
        return await work(client);
      } finally {
        client.release();
      }
    },
    inTransaction<T>(work: (client: PoolClient) => Promise<T>): Promise<T> {
      return this.withClient(client => transaction(client, () => work(client)));
    },
  };
}

// The enclosing transaction already provides atomicity
function transactionConnection(client: PoolClient): Connection {
  return {
    withClient: <T>(work: (client: PoolClient) => Promise<T>): Promise<T> => work(client),
    inTransaction: <T>(work: (client: PoolClient) => Promise<T>): Promise<T> => work(client),
  };
}

// ============================================================================
// Row mapping
// ============================================================================

type CatalogRow = {
  id: number;
  name: string;
  photo: string | null;
  original_price: string;
  discount: string;
  final_price: string;
  description: string | null;
  status: string;
};

type CartRow = {
  id: number;
  user_id: number;
  item_type: string;
  item_id: number;
  quantity: number;
  added_at: Date;
};

type OrderRow = {
  id: number;
  user_id: number;
  total_amount: string;
  payment_mode: string;
  delivery_location: string;
  order_date: Date;
  order_status: string;
};

type OrderItemRow = {
  id: number;
  order_id: number;
  item_type: string;
  item_id: number;
  quantity: number;
  price: string;
};

type UserRow = {
  id: number;
  full_name: string;
  mobile: string;
  email: string;
  location: string;
  latitude: string | null;
  longitude: string | null;
  password_hash: string;
  created_at: Date;
};

function toItemRef(itemType: string, itemId: number): ItemRef {
  if (!isItemKind(itemType)) {
    throw new Error(`Unknown item type '${itemType}' for item ${itemId}`);
  }
  return itemRef(itemType, itemId);
}

function toCatalogItem(kind: ItemKind, row: CatalogRow): CatalogItem {
  return {
    ref: itemRef(kind, row.id),
    name: row.name,
    photo: row.photo,
    description: row.description,
    originalPrice: parseFloat(row.original_price),
    discount: parseFloat(row.discount),
    finalPrice: parseFloat(row.final_price),
    status: row.status === 'active' ? 'active' : 'inactive',
  };
}

function toCartLine(row: CartRow): CartLine {
  return {
    id: row.id,
    userId: row.user_id,
    item: toItemRef(row.item_type, row.item_id),
    quantity: row.quantity,
    addedAt: row.added_at,
  };
}

function toOrderLine(row: OrderItemRow): OrderLine {
  return {
    id: row.id,
    orderId: row.order_id,
    item: toItemRef(row.item_type, row.item_id),
    quantity: row.quantity,
    unitPrice: parseFloat(row.price),
  };
}

function toOrder(row: OrderRow, lines: OrderLine[]): Order {
  return {
    id: row.id,
    userId: row.user_id,
    totalAmount: parseFloat(row.total_amount),
    paymentMode: row.payment_mode,
    deliveryLocation: row.delivery_location,
    createdAt: row.order_date,
    status: row.order_status,
    lines,
  };
}

function toUser(row: UserRow): User {
  return {
    id: row.id,
    fullName: row.full_name,
    mobile: row.mobile,
    email: row.email,
    location: row.location,
    latitude: row.latitude,
    longitude: row.longitude,
    passwordHash: row.password_hash,
    createdAt: row.created_at,
  };
}

// ============================================================================
// PostgreSQL Catalog Repository
// ============================================================================

// Both catalog tables share one shape apart from the description column
const CATALOG_SELECT: Record<ItemKind, string> = {
  service: `SELECT id, name, photo, original_price, discount, final_price,
                   short_description AS description, status
            FROM services`,
  menu: `SELECT id, name, photo, original_price, discount, final_price,
                description, status
         FROM menu_items`,
};

class PostgresCatalogRepository implements CatalogRepository {
  constructor(private connection: Connection) {}

  async listActive(kind: ItemKind): Promise<CatalogItem[]> {
    return this.connection.withClient(async client => {
      const result = await client.query<CatalogRow>(
        `${CATALOG_SELECT[kind]} WHERE status = 'active' ORDER BY id`
      );
      return result.rows.map(row => toCatalogItem(kind, row));
    });
  }

  async getByRef(ref: ItemRef): Promise<CatalogItem | null> {
    return matchItemRef(ref, {
      service: id => this.findOne('service', id),
      menu: id => this.findOne('menu', id),
    });
  }

  async getByRefs(refs: ItemRef[]): Promise<Map<string, CatalogItem>> {
    const items = new Map<string, CatalogItem>();
    if (refs.length === 0) {
      return items;
    }

    const idsByKind: Record<ItemKind, number[]> = {service: [], menu: []};
    for (const ref of refs) {
      idsByKind[ref.kind].push(ref.id);
    }

    await this.connection.withClient(async client => {
      for (const kind of ['service', 'menu'] as const) {
        const ids = idsByKind[kind];
        if (ids.length === 0) continue;

        const result = await client.query<CatalogRow>(
          `${CATALOG_SELECT[kind]} WHERE id = ANY($1)`,
          [ids]
        );
        for (const row of result.rows) {
          const item = toCatalogItem(kind, row);
          items.set(itemRefKey(item.ref), item);
        }
      }
    });

    return items;
  }

  private async findOne(kind: ItemKind, id: number): Promise<CatalogItem | null> {
    return this.connection.withClient(async client => {
      const result = await client.query<CatalogRow>(`${CATALOG_SELECT[kind]} WHERE id = $1`, [id]);
      return result.rows.length === 0 ? null : toCatalogItem(kind, result.rows[0]);
    });
  }
}

// ============================================================================
// PostgreSQL Cart Repository
// ============================================================================

const CART_COLUMNS = 'id, user_id, item_type, item_id, quantity, added_at';

class PostgresCartRepository implements CartRepository {
  constructor(private connection: Connection) {}

  async listByUser(userId: number): Promise<CartLine[]> {
    return this.connection.withClient(async client => {
      const result = await client.query<CartRow>(
        `SELECT ${CART_COLUMNS} FROM cart WHERE user_id = $1 ORDER BY id`,
        [userId]
      );
      return result.rows.map(toCartLine);
    });
  }

  async getById(cartLineId: number): Promise<CartLine | null> {
    return this.connection.withClient(async client => {
      const result = await client.query<CartRow>(
        `SELECT ${CART_COLUMNS} FROM cart WHERE id = $1`,
        [cartLineId]
      );
      return result.rows.length === 0 ? null : toCartLine(result.rows[0]);
    });
  }

  async addQuantity(userId: number, item: ItemRef, quantity: number): Promise<CartLine> {
    return this.connection.withClient(async client => {
      const result = await client.query<CartRow>(
        `INSERT INTO cart (user_id, item_type, item_id, quantity)
         VALUES ($1, $2, $3, $4)
         ON CONFLICT (user_id, item_type, item_id)
           DO UPDATE SET quantity = cart.quantity + EXCLUDED.quantity
         RETURNING ${CART_COLUMNS}`,
        [userId, item.kind, item.id, quantity]
      );
      return toCartLine(result.rows[0]);
    });
  }

  async deleteById(cartLineId: number): Promise<void> {
    await this.connection.withClient(client =>
      client.query('DELETE FROM cart WHERE id = $1', [cartLineId])
    );
  }

  async clearForUser(userId: number): Promise<number> {
    return this.connection.withClient(async client => {
      const result = await client.query('DELETE FROM cart WHERE user_id = $1', [userId]);
      return result.rowCount ?? 0;
    });
  }
}

// ============================================================================
// PostgreSQL Order Repository
// ============================================================================

class PostgresOrderRepository implements OrderRepository {
  constructor(private connection: Connection) {}

  async create(draft: OrderDraft): Promise<Order> {
    return this.connection.inTransaction(async client => {
      const orderResult = await client.query<OrderRow>(
        `INSERT INTO orders (user_id, total_amount, payment_mode, delivery_location, order_status)
         VALUES ($1, $2, $3, $4, $5)
         RETURNING id, user_id, total_amount, payment_mode, delivery_location, order_date, order_status`,
        [draft.userId, draft.totalAmount, draft.paymentMode, draft.deliveryLocation, draft.status]
      );
      const orderRow = orderResult.rows[0];

      const lines: OrderLine[] = [];
      for (const line of draft.lines) {
        const itemResult = await client.query<OrderItemRow>(
          `INSERT INTO order_items (order_id, item_type, item_id, quantity, price)
           VALUES ($1, $2, $3, $4, $5)
           RETURNING id, order_id, item_type, item_id, quantity, price`,
          [orderRow.id, line.item.kind, line.item.id, line.quantity, line.unitPrice]
        );
        lines.push(toOrderLine(itemResult.rows[0]));
      }

      return toOrder(orderRow, lines);
    });
  }

  async listByUser(userId: number): Promise<Order[]> {
    return this.connection.withClient(async client => {
      const orderResult = await client.query<OrderRow>(
        `SELECT id, user_id, total_amount, payment_mode, delivery_location, order_date, order_status
         FROM orders WHERE user_id = $1
         ORDER BY order_date DESC, id DESC`,
        [userId]
      );
      if (orderResult.rows.length === 0) {
        return [];
      }

      const itemsResult = await client.query<OrderItemRow>(
        `SELECT id, order_id, item_type, item_id, quantity, price
         FROM order_items WHERE order_id = ANY($1)
         ORDER BY id`,
        [orderResult.rows.map(row => row.id)]
      );

      const linesByOrder = new Map<number, OrderLine[]>();
      for (const row of itemsResult.rows) {
        linesByOrder.set(row.order_id, [...(linesByOrder.get(row.order_id) ?? []), toOrderLine(row)]);
      }

      return orderResult.rows.map(row => toOrder(row, linesByOrder.get(row.id) ?? []));
    });
  }
}

// ============================================================================
// PostgreSQL User Repository
// ============================================================================

const USER_COLUMNS = 'id, full_name, mobile, email, location, latitude, longitude, password_hash, created_at';

class PostgresUserRepository implements UserRepository {
  constructor(private connection: Connection) {}

  getById(id: number): Promise<User | null> {
    return this.findOneBy('id', id);
  }

  getByMobile(mobile: string): Promise<User | null> {
    return this.findOneBy('mobile', mobile);
  }

  getByEmail(email: string): Promise<User | null> {
    return this.findOneBy('email', email);
  }

  async create(user: NewUser): Promise<User> {
    return this.connection.withClient(async client => {
      const result = await client.query<UserRow>(
        `INSERT INTO users (full_name, mobile, email, location, latitude, longitude, password_hash)
         VALUES ($1, $2, $3, $4, $5, $6, $7)
         RETURNING ${USER_COLUMNS}`,
        [user.fullName, user.mobile, user.email, user.location, user.latitude, user.longitude, user.passwordHash]
      );
      return toUser(result.rows[0]);
    });
  }

  private async findOneBy(column: 'id' | 'mobile' | 'email', value: number | string): Promise<User | null> {
    return this.connection.withClient(async client => {
      const result = await client.query<UserRow>(
        `SELECT ${USER_COLUMNS} FROM users WHERE ${column} = $1`,
        [value]
      );
      return result.rows.length === 0 ? null : toUser(result.rows[0]);
    });
  }
}

// ============================================================================
// PostgreSQL Transaction Runner
// ============================================================================

function transactionEffects(client: PoolClient): TransactionEffects {
  const connection = transactionConnection(client);
  return {
    catalog: new PostgresCatalogRepository(connection),
    carts: new PostgresCartRepository(connection),
    orders: new PostgresOrderRepository(connection),
  };
}

class PostgresTransactionRunner implements TransactionRunner {
  constructor(private pool: Pool) {}

  async runExclusive<T>(userId: number, work: (tx: TransactionEffects) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();
    try {
      return await transaction(client, async () => {
        // Released automatically at commit or rollback
        await client.query('SELECT pg_advisory_xact_lock($1, $2)', [CART_LOCK_NAMESPACE, userId]);
        return work(transactionEffects(client));
      });
    } finally {
      client.release();
    }
  }
}

// ============================================================================
// Scrypt Password Hasher
// ============================================================================

const SCRYPT_KEY_LENGTH = 64;

function deriveKey(password: string, salt: string): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    scrypt(password, salt, SCRYPT_KEY_LENGTH, (err, key) => (err ? reject(err) : resolve(key)));
  });
}

class ScryptPasswordHasher implements PasswordHasher {
  async hash(password: string): Promise<string> {
    const salt = randomBytes(16).toString('hex');
    const key = await deriveKey(password, salt);
    return `scrypt$${salt}$${key.toString('hex')}`;
  }

  async verify(password: string, passwordHash: string): Promise<boolean> {
    const [scheme, salt, expected] = passwordHash.split('$');
    if (scheme !== 'scrypt' || !salt || !expected) {
      return false;
    }
    const key = await deriveKey(password, salt);
    const expectedKey = Buffer.from(expected, 'hex');
    return expectedKey.length === key.length && timingSafeEqual(key, expectedKey);
  }
}

// ============================================================================
// Redis Session Store
// ============================================================================

const SessionRecordSchema = z.object({
  userId: z.number().int(),
  userName: z.string(),
});

class RedisSessionStore implements SessionStore {
  constructor(private client: RedisClient, private ttlSeconds: number) {}

  async create(record: SessionRecord): Promise<string> {
    const sessionId = randomUUID();
    await this.client.setEx(this.key(sessionId), this.ttlSeconds, JSON.stringify(record));
    return sessionId;
  }

  async get(sessionId: string): Promise<SessionRecord | null> {
    const raw = await this.client.get(this.key(sessionId));
    if (raw === null) {
      return null;
    }

    const parsed = SessionRecordSchema.safeParse(parseJson(raw));
    if (!parsed.success) {
      console.warn(`Discarding malformed session ${sessionId}`);
      await this.destroy(sessionId);
      return null;
    }
    return parsed.data;
  }

  async destroy(sessionId: string): Promise<void> {
    await this.client.del(this.key(sessionId));
  }

  private key(sessionId: string): string {
    return `session:${sessionId}`;
  }
}

function parseJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return undefined;
  }
}

// ============================================================================
// Nodemailer Notification Service
// ============================================================================

class NodemailerNotificationService implements NotificationService {
  private transporter: Transporter;

  constructor(private config: EmailConfig) {
    this.transporter = nodemailer.createTransport({
      host: config.host,
      port: config.port,
      secure: false,
      ignoreTLS: true,
    });
  }

  async sendEmail(payload: NotificationPayload): Promise<void> {
    try {
      await this.transporter.sendMail({
        from: this.config.from,
        to: payload.to,
        subject: payload.subject,
        text: payload.body,
        html: `<p>${escapeHtml(payload.body).replace(/\n/g, '<br>')}</p>`,
      });
      console.log(`Email sent to ${payload.to}: ${payload.subject}`);
    } catch (error) {
      console.error('Failed to send email:', error);
      throw new Error('Email service unavailable');
    }
  }
}

function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;');
}

// ============================================================================
// CloudWatch Monitoring Service (CloudWatch + SNS)
// ============================================================================

class CloudWatchMonitoringService implements MonitoringService {
  private cloudwatch: CloudWatchClient;
  private sns: SNSClient;

  constructor(private config: AwsConfig) {
    const clientConfig = {
      region: config.region,
      endpoint: config.monitoringEndpoint,
      credentials: {
        accessKeyId: config.accessKeyId,
        secretAccessKey: config.secretAccessKey,
      },
    };
    this.cloudwatch = new CloudWatchClient(clientConfig);
    this.sns = new SNSClient(clientConfig);
  }

  async sendAlerts(alerts: MissingItemAlert[]): Promise<void> {
    if (alerts.length === 0) {
      return;
    }

    try {
      await this.cloudwatch.send(new PutMetricDataCommand({
        Namespace: 'Ordering',
        MetricData: [
          {
            MetricName: 'SkippedCartLines',
            Value: alerts.length,
            Unit: 'Count',
            Timestamp: new Date(),
          },
        ],
      }));

      const message = alerts
        .map(alert => `Missing item: ${itemRefKey(alert.item)} x${alert.quantity} (order: ${alert.orderId}, user: ${alert.userId})`)
        .join('\n');

      await this.sns.send(new PublishCommand({
        TopicArn: this.config.alertTopicArn,
        Subject: 'Ordering Alert: Cart lines dropped at checkout',
        Message: `The following cart lines referenced items that no longer exist and were left out of the order:\n\n${message}`,
      }));

      console.log(`Sent ${alerts.length} missing item alerts to monitoring service`);
    } catch (error) {
      console.error('Failed to send monitoring alerts:', error);
      throw new Error('Monitoring service unavailable');
    }
  }
}

// ============================================================================
// Production EffectsFactory
// ============================================================================

class EffectsFactory implements AppEffects {
  private _pool?: Pool;
  private _redisClient?: RedisClient;
  private _catalogRepository?: CatalogRepository;
  private _cartRepository?: CartRepository;
  private _orderRepository?: OrderRepository;
  private _transactionRunner?: TransactionRunner;
  private _userRepository?: UserRepository;
  private _passwordHasher?: PasswordHasher;
  private _sessionStore?: SessionStore;
  private _notificationService?: NotificationService;
  private _monitoringService?: MonitoringService;

  constructor(private config: ProductionConfig) {}

  private async getPool(): Promise<Pool> {
    if (!this._pool) {
      this._pool = new Pool({
        host: this.config.database.host,
        port: this.config.database.port,
        user: this.config.database.user,
        password: this.config.database.password,
        database: this.config.database.database,
        max: 20,
        idleTimeoutMillis: 30000,
        connectionTimeoutMillis: 2000,
      });

      try {
        const schema = await readFile(SCHEMA_PATH, 'utf8');
        await this._pool.query(schema);
        console.log('✅ Connected to PostgreSQL, schema applied');
      } catch (error) {
        console.error('❌ Failed to prepare PostgreSQL:', error);
        throw error;
      }
    }
    return this._pool;
  }

  private async getRedisClient(): Promise<RedisClient> {
    if (!this._redisClient) {
      this._redisClient = createClient({
        socket: {
          host: this.config.redis.host,
          port: this.config.redis.port,
        },
      });

      this._redisClient.on('error', (err) => console.error('Redis Client Error:', err));

      await this._redisClient.connect();
      console.log('✅ Connected to Redis');
    }
    return this._redisClient;
  }

  private requirePool(): Pool {
    if (!this._pool) {
      throw new Error('Database pool not initialized. Call initialize() first.');
    }
    return this._pool;
  }

  get catalog(): CatalogRepository {
    if (!this._catalogRepository) {
      this._catalogRepository = new PostgresCatalogRepository(pooledConnection(this.requirePool()));
    }
    return this._catalogRepository;
  }

  get carts(): CartRepository {
    if (!this._cartRepository) {
      this._cartRepository = new PostgresCartRepository(pooledConnection(this.requirePool()));
    }
    return this._cartRepository;
  }

  get orders(): OrderRepository {
    if (!this._orderRepository) {
      this._orderRepository = new PostgresOrderRepository(pooledConnection(this.requirePool()));
    }
    return this._orderRepository;
  }

  get transactions(): TransactionRunner {
    if (!this._transactionRunner) {
      this._transactionRunner = new PostgresTransactionRunner(this.requirePool());
    }
    return this._transactionRunner;
  }

  get users(): UserRepository {
    if (!this._userRepository) {
      this._userRepository = new PostgresUserRepository(pooledConnection(this.requirePool()));
    }
    return this._userRepository;
  }

  get passwords(): PasswordHasher {
    if (!this._passwordHasher) {
      this._passwordHasher = new ScryptPasswordHasher();
    }
    return this._passwordHasher;
  }

  get sessions(): SessionStore {
    if (!this._sessionStore) {
      if (!this._redisClient) {
        throw new Error('Redis client not initialized. Call initialize() first.');
      }
      this._sessionStore = new RedisSessionStore(this._redisClient, this.config.session.ttlSeconds);
    }
    return this._sessionStore;
  }

  get notifications(): NotificationService {
    if (!this._notificationService) {
      this._notificationService = new NodemailerNotificationService(this.config.email);
    }
    return this._notificationService;
  }

  get monitoring(): MonitoringService {
    if (!this._monitoringService) {
      this._monitoringService = new CloudWatchMonitoringService(this.config.aws);
    }
    return this._monitoringService;
  }

  /**
   * Initialize all connections (PostgreSQL, Redis)
   * Must be called before using the effects
   */
  async initialize(): Promise<void> {
    await this.getPool();
    await this.getRedisClient();
    console.log('✅ All production effects initialized');
  }

  async close(): Promise<void> {
    await Promise.all([
      this._pool?.end(),
      this._redisClient?.quit(),
    ]);
    console.log('Connections closed');
  }

  static async make(config?: ProductionConfig): Promise<EffectsFactory> {
    const effects = new EffectsFactory(config || loadConfigFromEnv());
    await effects.initialize();
    return effects;
  }
}

export type ProductionEffects = AppEffects & {
  close(): Promise<void>;
};

export async function makeAppEffects(config?: ProductionConfig): Promise<ProductionEffects> {
  return EffectsFactory.make(config);
}
