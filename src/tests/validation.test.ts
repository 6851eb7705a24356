import {Either} from 'purify-ts';
import {OrderingError} from '../pure/errors';
import {
  parseAddToCartForm,
  parseCartLineId,
  parseItemRef,
  parseLoginForm,
  parsePlaceOrderForm,
  parseRegisterForm,
} from '../pure/validation';

function issuesOf(result: Either<OrderingError, unknown>): string[] {
  return result.caseOf({
    Left: error => error.type === 'validation' ? error.issues : [],
    Right: () => [],
  });
}

const registration = {
  full_name: 'Asha Rao',
  mobile: ' 5550001 ',
  email: 'asha@example.com',
  location: 'Pune',
  latitude: '18.52',
  longitude: '',
  password: 'test-password',
  confirm_password: 'test-password',
};

describe('parseAddToCartForm', () => {
  it('coerces the url-encoded fields', () => {
    const result = parseAddToCartForm({ item_type: 'service', item_id: '3', quantity: '2' });

    expect(result.isRight()).toBe(true);
    expect(result.extract()).toEqual({ item: { kind: 'service', id: 3 }, quantity: 2 });
  });

  it('defaults the quantity to 1', () => {
    const result = parseAddToCartForm({ item_type: 'menu', item_id: 8 });

    expect(result.extract()).toEqual({ item: { kind: 'menu', id: 8 }, quantity: 1 });
  });

  it.each(['0', '-1', '2.5', 'abc'])('rejects quantity %p', (quantity) => {
    const result = parseAddToCartForm({ item_type: 'service', item_id: '3', quantity });

    expect(result.isLeft()).toBe(true);
    expect(issuesOf(result)).toHaveLength(1);
    expect(issuesOf(result)[0]).toMatch(/^quantity: /);
  });

  it.each(['3000000000', '9007199254740993'])('rejects quantity %p beyond the stored integer range', (quantity) => {
    const result = parseAddToCartForm({ item_type: 'service', item_id: '3', quantity });

    expect(issuesOf(result)).toHaveLength(1);
    expect(issuesOf(result)[0]).toMatch(/^quantity: /);
  });

  it('accepts the largest storable quantity', () => {
    const result = parseAddToCartForm({ item_type: 'service', item_id: '3', quantity: '2147483647' });

    expect(result.extract()).toEqual({ item: { kind: 'service', id: 3 }, quantity: 2147483647 });
  });

  it('rejects an item id beyond the stored integer range', () => {
    const result = parseAddToCartForm({ item_type: 'service', item_id: '3000000000' });

    expect(issuesOf(result)).toHaveLength(1);
    expect(issuesOf(result)[0]).toMatch(/^item_id: /);
  });

  it('rejects unknown item kinds', () => {
    const result = parseAddToCartForm({ item_type: 'product', item_id: '3' });

    expect(issuesOf(result)[0]).toMatch(/^item_type: /);
  });
});

describe('parseItemRef', () => {
  it('builds a menu reference', () => {
    expect(parseItemRef({ item_type: 'menu', item_id: '12' }).extract()).toEqual({ kind: 'menu', id: 12 });
  });

  it('rejects a missing id', () => {
    const result = parseItemRef({ item_type: 'menu' });

    expect(result.isLeft()).toBe(true);
    expect(issuesOf(result)[0]).toMatch(/^item_id: /);
  });
});

describe('parsePlaceOrderForm', () => {
  it('trims the delivery details', () => {
    const result = parsePlaceOrderForm({ delivery_location: '  12 Main St ', payment_mode: 'COD' });

    expect(result.extract()).toEqual({ deliveryLocation: '12 Main St', paymentMode: 'COD' });
  });

  it('requires a delivery location', () => {
    const result = parsePlaceOrderForm({ delivery_location: '   ', payment_mode: 'COD' });

    expect(issuesOf(result)).toHaveLength(1);
    expect(issuesOf(result)[0]).toMatch(/^delivery_location: /);
  });

  it('limits the payment mode length', () => {
    const result = parsePlaceOrderForm({ delivery_location: '12 Main St', payment_mode: 'X'.repeat(21) });

    expect(issuesOf(result)[0]).toMatch(/^payment_mode: /);
  });
});

describe('parseRegisterForm', () => {
  it('normalises the optional coordinates', () => {
    const result = parseRegisterForm(registration);

    expect(result.extract()).toEqual({
      fullName: 'Asha Rao',
      mobile: '5550001',
      email: 'asha@example.com',
      location: 'Pune',
      latitude: '18.52',
      longitude: null,
      password: 'test-password',
    });
  });

  it('rejects mismatched passwords', () => {
    const result = parseRegisterForm({ ...registration, confirm_password: 'other-password' });

    expect(issuesOf(result)).toEqual(['confirm_password: Passwords do not match!']);
  });

  it('rejects an invalid e-mail address', () => {
    const result = parseRegisterForm({ ...registration, email: 'not-an-email' });

    expect(issuesOf(result)[0]).toMatch(/^email: /);
  });
});

describe('parseLoginForm', () => {
  it('requires both fields', () => {
    const result = parseLoginForm({ mobile: '5550001' });

    expect(issuesOf(result)[0]).toMatch(/^password: /);
  });
});

describe('parseCartLineId', () => {
  it('accepts a numeric route param', () => {
    expect(parseCartLineId('12').extract()).toBe(12);
  });

  it('rejects anything else', () => {
    expect(parseCartLineId('twelve').isLeft()).toBe(true);
    expect(parseCartLineId('3000000000').isLeft()).toBe(true);
  });
});
