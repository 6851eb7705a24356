/**
 * Parsing of untrusted form input. Numeric fields arrive as strings from
 * url-encoded forms, so they are coerced before being checked.
 */

import {z} from 'zod';
import {Either, Left, Right} from 'purify-ts';
import {ItemRef} from '../domain';
import {AddToCartRequest, LoginRequest, PlaceOrderRequest, RegistrationRequest} from './types';
import {OrderingError, validationError} from './errors';
import {ITEM_KINDS, itemRef} from './itemRef';
import {MAX_STORED_INTEGER} from './businessLogic';

const positiveInteger = z.coerce.number().int().positive().max(MAX_STORED_INTEGER);

const requiredText = (max: number) => z.string().trim().min(1).max(max);

const optionalText = (max: number) =>
  z.string().trim().max(max).optional().transform(value => value ? value : null);

export const ItemRefParamsSchema = z.object({
  item_type: z.enum(ITEM_KINDS),
  item_id: positiveInteger,
});

export const AddToCartFormSchema = ItemRefParamsSchema.extend({
  quantity: positiveInteger.default(1),
});

export const PlaceOrderFormSchema = z.object({
  delivery_location: requiredText(500),
  payment_mode: requiredText(20),
});

export const RegisterFormSchema = z.object({
  full_name: requiredText(100),
  mobile: requiredText(15),
  email: z.string().trim().email().max(100),
  location: requiredText(200),
  latitude: optionalText(50),
  longitude: optionalText(50),
  password: z.string().min(1),
  confirm_password: z.string(),
}).refine(form => form.password === form.confirm_password, {
  message: 'Passwords do not match!',
  path: ['confirm_password'],
});

export const LoginFormSchema = z.object({
  mobile: requiredText(15),
  password: z.string().min(1),
});

export const CartLineIdSchema = positiveInteger;

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(issue =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
  );
}

function parseWith<S extends z.ZodTypeAny, T>(
  schema: S,
  input: unknown,
  toRequest: (data: z.output<S>) => T
): Either<OrderingError, T> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    return Left(validationError(formatIssues(parsed.error)));
  }
  return Right(toRequest(parsed.data));
}

export function parseItemRef(input: unknown): Either<OrderingError, ItemRef> {
  return parseWith(ItemRefParamsSchema, input, data => itemRef(data.item_type, data.item_id));
}

export function parseAddToCartForm(input: unknown): Either<OrderingError, AddToCartRequest> {
  return parseWith(AddToCartFormSchema, input, data => ({
    item: itemRef(data.item_type, data.item_id),
    quantity: data.quantity,
  }));
}

export function parsePlaceOrderForm(input: unknown): Either<OrderingError, PlaceOrderRequest> {
  return parseWith(PlaceOrderFormSchema, input, data => ({
    deliveryLocation: data.delivery_location,
    paymentMode: data.payment_mode,
  }));
}

export function parseRegisterForm(input: unknown): Either<OrderingError, RegistrationRequest> {
  return parseWith(RegisterFormSchema, input, data => ({
    fullName: data.full_name,
    mobile: data.mobile,
    email: data.email,
    location: data.location,
    latitude: data.latitude,
    longitude: data.longitude,
    password: data.password,
  }));
}

export function parseLoginForm(input: unknown): Either<OrderingError, LoginRequest> {
  return parseWith(LoginFormSchema, input, data => ({
    mobile: data.mobile,
    password: data.password,
  }));
}

export function parseCartLineId(input: unknown): Either<OrderingError, number> {
  return parseWith(CartLineIdSchema, input, data => data);
}
