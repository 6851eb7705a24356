/**
 * PURE BUSINESS LOGIC
 *
 * These functions take values and return values. No effects whatsoever.
 * They are tested by calling them with inputs and checking outputs.
 *
 * Prices are plain numbers. Order totals are rounded to cents; currency is
 * not modelled.
 */

import {CartLine, CatalogItem, ItemRef, Order, User} from '../domain';
import {NotificationPayload, SessionRecord} from '../types';
import {
  CartView,
  CatalogSummary,
  MissingItemAlert,
  NewUser,
  OrderDraft,
  OrderHistoryEntry,
  OrderLineDraft,
  PlaceOrderRequest,
  PricedLine,
  RegistrationRequest,
} from './types';
import {itemRefKey, sameItem} from './itemRef';
import {Maybe} from 'purify-ts';

export const DEFAULT_ORDER_STATUS = 'Pending';

// Largest value of the INTEGER columns holding ids and quantities
export const MAX_STORED_INTEGER = 2_147_483_647;

// ============================================================================
// Pricing
// ============================================================================

export function collectItemRefs(lines: {readonly item: ItemRef}[]): ItemRef[] {
  const unique = new Map<string, ItemRef>();
  for (const line of lines) {
    unique.set(itemRefKey(line.item), line.item);
  }
  return [...unique.values()];
}

/**
 * Prices cart lines against the current catalog. Lines whose item can no
 * longer be resolved are left out of the priced lines and reported as
 * skipped; they never fail the whole cart.
 */
export function priceCartLines(
  cartLines: CartLine[],
  catalog: Map<string, CatalogItem>
): { lines: PricedLine[]; skippedLines: Maybe<CartLine[]> } {
  const result = cartLines.reduce(
    (acc, cartLine) => {
      const catalogItem = catalog.get(itemRefKey(cartLine.item));

      if (!catalogItem) {
        return {
          ...acc,
          skippedLines: [...acc.skippedLines, cartLine]
        };
      }

      return {
        ...acc,
        lines: [...acc.lines, {
          cartLineId: cartLine.id,
          item: cartLine.item,
          name: catalogItem.name,
          photo: catalogItem.photo,
          quantity: cartLine.quantity,
          unitPrice: catalogItem.finalPrice,
          lineTotal: calculateLineTotal(catalogItem.finalPrice, cartLine.quantity),
        }]
      };
    },
    { lines: [] as PricedLine[], skippedLines: [] as CartLine[] }
  );

  return {
    lines: result.lines,
    skippedLines: Maybe.fromPredicate(skipped => skipped.length > 0, result.skippedLines)
  };
}

export function calculateLineTotal(unitPrice: number, quantity: number): number {
  return unitPrice * quantity;
}

export function calculateSubtotal(lines: PricedLine[]): number {
  return lines.reduce((sum, line) => sum + line.lineTotal, 0);
}

/**
 * Order total rounded to cents, the precision it is stored with, so the stored
 * total reads back equal to this value.
 */
export function calculateOrderTotal(lines: {readonly quantity: number; readonly unitPrice: number}[]): number {
  return roundToCents(lines.reduce((sum, line) => sum + calculateLineTotal(line.unitPrice, line.quantity), 0));
}

export function roundToCents(amount: number): number {
  return Math.round(amount * 100) / 100;
}

// ============================================================================
// Data Transformations
// ============================================================================

export function toCartView(lines: PricedLine[]): CartView {
  return {
    lines,
    total: calculateSubtotal(lines),
  };
}

export function toOrderLineDrafts(lines: PricedLine[]): OrderLineDraft[] {
  return lines.map(line => ({
    item: line.item,
    quantity: line.quantity,
    unitPrice: line.unitPrice,
  }));
}

/**
 * Snapshot the priced lines into an order. The total is summed from the
 * snapshotted lines so it always equals sum(quantity * unitPrice).
 */
export function toOrderDraft(
  userId: number,
  request: PlaceOrderRequest,
  lines: PricedLine[]
): OrderDraft {
  const lineDrafts = toOrderLineDrafts(lines);

  return {
    userId,
    totalAmount: calculateOrderTotal(lineDrafts),
    paymentMode: request.paymentMode,
    deliveryLocation: request.deliveryLocation,
    status: DEFAULT_ORDER_STATUS,
    lines: lineDrafts,
  };
}

export function toCatalogSummary(item: CatalogItem): CatalogSummary {
  return {
    name: item.name,
    photo: item.photo,
  };
}

export function sortMostRecentFirst(orders: Order[]): Order[] {
  return [...orders].sort((a, b) =>
    b.createdAt.getTime() - a.createdAt.getTime() || b.id - a.id
  );
}

/**
 * Enrichment is display-only: a line whose item was deleted keeps its stored
 * quantity and price and simply has no catalog summary.
 */
export function toOrderHistory(
  orders: Order[],
  catalog: Map<string, CatalogItem>
): OrderHistoryEntry[] {
  return sortMostRecentFirst(orders).map(order => ({
    ...order,
    lines: order.lines.map(line => ({
      ...line,
      catalogItem: Maybe.fromNullable(catalog.get(itemRefKey(line.item)))
        .map(toCatalogSummary)
        .extractNullable(),
    })),
  }));
}

// ============================================================================
// Cart Ownership
// ============================================================================

export function isOwnedBy(line: CartLine, userId: number): boolean {
  return line.userId === userId;
}

/**
 * Whether adding the quantity keeps the item's cart line within the stored
 * range. There is no business limit on quantities.
 */
export function fitsLineQuantity(cartLines: CartLine[], item: ItemRef, quantity: number): boolean {
  const current = cartLines.find(line => sameItem(line.item, item))?.quantity ?? 0;
  return current + quantity <= MAX_STORED_INTEGER;
}

// ============================================================================
// Accounts
// ============================================================================

export function toNewUser(request: RegistrationRequest, passwordHash: string): NewUser {
  return {
    fullName: request.fullName,
    mobile: request.mobile,
    email: request.email,
    location: request.location,
    latitude: request.latitude,
    longitude: request.longitude,
    passwordHash,
  };
}

export function toSessionRecord(user: User): SessionRecord {
  return {
    userId: user.id,
    userName: user.fullName,
  };
}

// ============================================================================
// Notifications & Monitoring Data Preparation
// ============================================================================

export function buildConfirmationEmail(user: User, order: Order): NotificationPayload {
  const lines = order.lines
    .map(line => `- ${line.quantity} x ${itemRefKey(line.item)} @ $${line.unitPrice.toFixed(2)}`)
    .join('\n');

  return {
    to: user.email,
    subject: `Order #${order.id} Confirmed`,
    body: `
Thank you for your order, ${user.fullName}!

${lines}

Total: $${order.totalAmount.toFixed(2)}
Payment mode: ${order.paymentMode}
Delivery to: ${order.deliveryLocation}
    `.trim(),
  };
}

export function buildMissingItemAlerts(
  order: Order,
  skippedLines: CartLine[]
): MissingItemAlert[] {
  return skippedLines.map(line => ({
    type: 'missing_catalog_item' as const,
    item: line.item,
    quantity: line.quantity,
    userId: order.userId,
    orderId: order.id,
  }));
}
