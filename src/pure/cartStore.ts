/**
 * CART STORE - The Coordinator for cart reads and mutations
 *
 * Mutations run inside the user's exclusive transaction so they serialize
 * with checkout: a line added while an order is being assembled lands either
 * before the cart is read or after it is cleared, never in between.
 */

import {CartLine} from '../domain';
import {AppEffects} from './effects';
import {CartView} from './types';
import {
  collectItemRefs,
  fitsLineQuantity,
  isOwnedBy,
  MAX_STORED_INTEGER,
  priceCartLines,
  toCartView,
} from './businessLogic';
import {cartLineNotFound, OrderingError, unauthorized, validationError} from './errors';
import {parseAddToCartForm, parseCartLineId} from './validation';
import {itemRefKey} from './itemRef';
import {Either, Left, Right} from 'purify-ts';

/**
 * Add an item to the user's cart from untrusted form input.
 * @return either the validation failure or the resulting cart line
 */
export function addItem(
  userId: number,
  form: unknown
): (effects: Pick<AppEffects, 'transactions'>) => Promise<Either<OrderingError, CartLine>> {
  return async (effects) => {
    const request = parseAddToCartForm(form);

    return request.caseOf<Promise<Either<OrderingError, CartLine>>>({
      Left: (error) => Promise.resolve(Left(error)),
      Right: ({item, quantity}) =>
        effects.transactions.runExclusive(userId, async (tx): Promise<Either<OrderingError, CartLine>> => {
          const cartLines = await tx.carts.listByUser(userId);
          if (!fitsLineQuantity(cartLines, item, quantity)) {
            return Left(validationError([`quantity: cart line for ${itemRefKey(item)} would exceed ${MAX_STORED_INTEGER}`]));
          }
          return Right(await tx.carts.addQuantity(userId, item, quantity));
        })
    });
  };
}

export function listItems(
  userId: number
): (effects: Pick<AppEffects, 'carts'>) => Promise<CartLine[]> {
  return (effects) => effects.carts.listByUser(userId);
}

/**
 * Resolve the cart against the current catalog. The total is for display
 * only; checkout prices the cart again.
 */
export function viewCart(
  userId: number
): (effects: Pick<AppEffects, 'carts' | 'catalog'>) => Promise<CartView> {
  return async (effects) => {
    const cartLines = await effects.carts.listByUser(userId);
    const catalog = await effects.catalog.getByRefs(collectItemRefs(cartLines));
    const {lines, skippedLines} = priceCartLines(cartLines, catalog);

    skippedLines.ifJust(skipped =>
      console.warn(`Cart of user ${userId} references missing items: ${skipped.map(l => itemRefKey(l.item)).join(', ')}`)
    );

    return toCartView(lines);
  };
}

export function cartTotal(
  userId: number
): (effects: Pick<AppEffects, 'carts' | 'catalog'>) => Promise<number> {
  return async (effects) => (await viewCart(userId)(effects)).total;
}

/**
 * Remove one of the caller's cart lines, addressed by an untrusted id.
 * @return either validation / not found / unauthorized, or the removed line
 */
export function removeItem(
  userId: number,
  cartLineIdParam: unknown
): (effects: Pick<AppEffects, 'transactions'>) => Promise<Either<OrderingError, CartLine>> {
  return async (effects) => {
    const request = parseCartLineId(cartLineIdParam);

    return request.caseOf<Promise<Either<OrderingError, CartLine>>>({
      Left: (error) => Promise.resolve(Left(error)),
      Right: (cartLineId) =>
        effects.transactions.runExclusive(userId, async (tx): Promise<Either<OrderingError, CartLine>> => {
          const line = await tx.carts.getById(cartLineId);
          if (!line) {
            return Left(cartLineNotFound(cartLineId));
          }
          if (!isOwnedBy(line, userId)) {
            return Left(unauthorized(userId, cartLineId));
          }

          await tx.carts.deleteById(cartLineId);
          return Right(line);
        })
    });
  };
}

/**
 * Delete every line of the user's cart.
 * @return the number of lines removed
 */
export function clearCart(
  userId: number
): (effects: Pick<AppEffects, 'transactions'>) => Promise<number> {
  return (effects) => effects.transactions.runExclusive(userId, tx => tx.carts.clearForUser(userId));
}
