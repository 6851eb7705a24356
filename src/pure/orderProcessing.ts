/**
 * ORDER PROCESSOR - The Coordinator
 *
 * The effectful shell around checkout:
 * 1. Parses the untrusted checkout form
 * 2. Inside the user's exclusive transaction, reads the cart and current
 *    prices (effects), builds the order snapshot (pure) and writes it while
 *    clearing the cart (effects)
 * 3. After commit, performs the best-effort outputs (confirmation e-mail,
 *    monitoring of skipped lines)
 *
 * All the calculations live in businessLogic.ts.
 */

import {AppEffects, TransactionEffects} from './effects';
import {OrderHistoryEntry, OrderPlacement, PlaceOrderRequest} from './types';
import {
  buildConfirmationEmail,
  buildMissingItemAlerts,
  collectItemRefs,
  priceCartLines,
  toOrderDraft,
  toOrderHistory,
} from './businessLogic';
import {emptyCart, OrderingError} from './errors';
import {parsePlaceOrderForm} from './validation';
import {Either, EitherAsync, Left, Right} from 'purify-ts';

/**
 * Place an order from the user's cart.
 *
 * @param userId the authenticated user
 * @param form untrusted checkout form (delivery_location, payment_mode)
 * @return a function to place the order using the given app effects returning
 * either the validation / empty cart failure or the placed order together
 * with the cart lines that were dropped because their item no longer exists
 * @throws Error when the transaction fails; nothing is committed in that case
 */
export function placeOrder(
  userId: number,
  form: unknown
): (appEffects: AppEffects) => Promise<Either<OrderingError, OrderPlacement>> {
  return async (appEffects: AppEffects) => {
    const request = parsePlaceOrderForm(form);

    return request.caseOf<Promise<Either<OrderingError, OrderPlacement>>>({
      Left: (error) => Promise.resolve(Left(error)),
      Right: async (details) => {
        const placement = await appEffects.transactions.runExclusive(userId, assembleOrder(userId, details));
        await placement.map(finaliseOrder(appEffects)).orDefault(Promise.resolve());
        return placement;
      }
    });
  };
}

/**
 * Read, price, snapshot and clear. Runs inside one transaction, so the order,
 * its lines and the cleared cart become visible together or not at all.
 */
function assembleOrder(
  userId: number,
  request: PlaceOrderRequest
): (tx: TransactionEffects) => Promise<Either<OrderingError, OrderPlacement>> {
  return async (tx: TransactionEffects): Promise<Either<OrderingError, OrderPlacement>> => {
    // ========== GATHER INPUTS (Effects) ==========

    const cartLines = await tx.carts.listByUser(userId);
    if (cartLines.length === 0) {
      return Left(emptyCart(userId));
    }

    const catalog = await tx.catalog.getByRefs(collectItemRefs(cartLines));

    // ========== PURE BUSINESS LOGIC (No Effects) ==========

    // Lines whose item was deleted are dropped, the rest are priced now
    const {lines, skippedLines} = priceCartLines(cartLines, catalog);
    const draft = toOrderDraft(userId, request, lines);

    // ========== PERFORM OUTPUTS (Effects) ==========

    const order = await tx.orders.create(draft);
    await tx.carts.clearForUser(userId);

    return Right({order, skippedLines: skippedLines.orDefault([])});
  };
}

/**
 * Best-effort outputs once the order is committed. A failure here is logged
 * and never affects the placed order.
 */
function finaliseOrder(
  appEffects: AppEffects
): (placement: OrderPlacement) => Promise<void> {
  return async ({order, skippedLines}: OrderPlacement) => {
    const missingItemAlerts = buildMissingItemAlerts(order, skippedLines);

    const effects = [
      EitherAsync(async () => {
        const user = await appEffects.users.getById(order.userId);
        if (!user) {
          throw new Error(`User ${order.userId} not found`);
        }
        await appEffects.notifications.sendEmail(buildConfirmationEmail(user, order));
      }).mapLeft(err => `Confirmation email failed: ${toMessage(err)}`),
    ];

    if (missingItemAlerts.length > 0) {
      effects.push(
        EitherAsync(() => appEffects.monitoring.sendAlerts(missingItemAlerts))
          .mapLeft(err => `Alert send failed: ${toMessage(err)}`)
      );
    }

    const results = await Promise.all(effects.map(effect => effect.run()));
    Either.lefts(results).forEach(message => console.warn('Optional effect failed:', message));
  };
}

/**
 * Orders of the user, most recent first, with each line enriched from the
 * catalog for display when its item still exists.
 */
export function listOrders(
  userId: number
): (appEffects: Pick<AppEffects, 'orders' | 'catalog'>) => Promise<OrderHistoryEntry[]> {
  return async (appEffects) => {
    const orders = await appEffects.orders.listByUser(userId);
    const catalog = await appEffects.catalog.getByRefs(
      collectItemRefs(orders.flatMap(order => order.lines))
    );
    return toOrderHistory(orders, catalog);
  };
}

function toMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
