import {statusFor} from '../http/app';
import {readCookie} from '../http/session';
import {describeError, emptyCart, invalidCredentials, unauthorized, validationError} from '../pure/errors';

describe('readCookie', () => {
  it('finds the named cookie among others', () => {
    expect(readCookie('theme=dark; sid=session%2042', 'sid')).toBe('session 42');
  });

  it('returns null when the cookie is absent', () => {
    expect(readCookie('theme=dark', 'sid')).toBeNull();
    expect(readCookie(undefined, 'sid')).toBeNull();
  });
});

describe('error responses', () => {
  it('maps domain failures to status codes', () => {
    expect(statusFor(validationError(['quantity: too small']))).toBe(400);
    expect(statusFor(invalidCredentials())).toBe(401);
    expect(statusFor(unauthorized(7, 3))).toBe(403);
    expect(statusFor(emptyCart(7))).toBe(409);
  });

  it('describes failures for the client', () => {
    expect(describeError(emptyCart(7))).toBe('Your cart is empty!');
    expect(describeError(unauthorized(7, 3))).toBe('Cart line 3 does not belong to user 7');
    expect(describeError(validationError(['a: x', 'b: y']))).toBe('Invalid request: a: x; b: y');
  });
});
