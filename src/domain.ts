// Domain types shared across the application

export type ItemKind = 'service' | 'menu';

export type ServiceRef = {
  readonly kind: 'service';
  readonly id: number;
};

export type MenuItemRef = {
  readonly kind: 'menu';
  readonly id: number;
};

/** Reference to a catalog item living in one of the two catalog tables. */
export type ItemRef = ServiceRef | MenuItemRef;

export type CatalogStatus = 'active' | 'inactive';

export type CatalogItem = {
  readonly ref: ItemRef;
  readonly name: string;
  readonly photo: string | null;
  readonly description: string | null;
  readonly originalPrice: number;
  readonly discount: number;
  // Stored rather than derived so it can carry manual overrides
  readonly finalPrice: number;
  readonly status: CatalogStatus;
};

export type CartLine = {
  readonly id: number;
  readonly userId: number;
  readonly item: ItemRef;
  readonly quantity: number;
  readonly addedAt: Date;
};

export type Order = {
  readonly id: number;
  readonly userId: number;
  readonly totalAmount: number;
  readonly paymentMode: string;
  readonly deliveryLocation: string;
  readonly createdAt: Date;
  readonly status: string;
  readonly lines: OrderLine[];
};

export type OrderLine = {
  readonly id: number;
  readonly orderId: number;
  readonly item: ItemRef;
  readonly quantity: number;
  readonly unitPrice: number;
};

export type User = {
  readonly id: number;
  readonly fullName: string;
  readonly mobile: string;
  readonly email: string;
  readonly location: string;
  readonly latitude: string | null;
  readonly longitude: string | null;
  readonly passwordHash: string;
  readonly createdAt: Date;
};
