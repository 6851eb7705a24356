/**
 * Domain failures returned as the Left side of an Either. Infrastructure
 * failures are thrown instead (see effects/EffectsError).
 */

import {ItemRef} from '../domain';
import {itemRefKey} from './itemRef';

export type ValidationError = {
  readonly type: 'validation';
  readonly issues: string[];
};

export type EmptyCartError = {
  readonly type: 'empty_cart';
  readonly userId: number;
};

export type CartLineNotFoundError = {
  readonly type: 'cart_line_not_found';
  readonly cartLineId: number;
};

export type UnauthorizedError = {
  readonly type: 'unauthorized';
  readonly userId: number;
  readonly cartLineId: number;
};

export type ItemNotFoundError = {
  readonly type: 'item_not_found';
  readonly item: ItemRef;
};

export type DuplicateAccountError = {
  readonly type: 'duplicate_account';
  readonly field: 'mobile' | 'email';
};

export type InvalidCredentialsError = {
  readonly type: 'invalid_credentials';
};

export type OrderingError =
  | ValidationError
  | EmptyCartError
  | CartLineNotFoundError
  | UnauthorizedError
  | ItemNotFoundError
  | DuplicateAccountError
  | InvalidCredentialsError;

export const validationError = (issues: string[]): ValidationError => ({type: 'validation', issues});

export const emptyCart = (userId: number): EmptyCartError => ({type: 'empty_cart', userId});

export const cartLineNotFound = (cartLineId: number): CartLineNotFoundError => ({
  type: 'cart_line_not_found',
  cartLineId,
});

export const unauthorized = (userId: number, cartLineId: number): UnauthorizedError => ({
  type: 'unauthorized',
  userId,
  cartLineId,
});

export const itemNotFound = (item: ItemRef): ItemNotFoundError => ({type: 'item_not_found', item});

export const duplicateAccount = (field: DuplicateAccountError['field']): DuplicateAccountError => ({
  type: 'duplicate_account',
  field,
});

export const invalidCredentials = (): InvalidCredentialsError => ({type: 'invalid_credentials'});

export function describeError(error: OrderingError): string {
  switch (error.type) {
    case 'validation':
      return `Invalid request: ${error.issues.join('; ')}`;
    case 'empty_cart':
      return 'Your cart is empty!';
    case 'cart_line_not_found':
      return `Cart line ${error.cartLineId} not found`;
    case 'unauthorized':
      return `Cart line ${error.cartLineId} does not belong to user ${error.userId}`;
    case 'item_not_found':
      return `Item ${itemRefKey(error.item)} not found`;
    case 'duplicate_account':
      return error.field === 'mobile' ? 'Mobile number already registered!' : 'Email already registered!';
    case 'invalid_credentials':
      return 'Invalid mobile number or password!';
  }
}
