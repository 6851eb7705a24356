// Module product types

import {CartLine, ItemRef, Order, OrderLine, User} from "../domain";

export type PricedLine = {
    readonly cartLineId: number;
    readonly item: ItemRef;
    readonly name: string;
    readonly photo: string | null;
    readonly quantity: number;
    readonly unitPrice: number;
    readonly lineTotal: number;
};

export type CartView = {
    readonly lines: PricedLine[];
    readonly total: number;
};

export type AddToCartRequest = {
    readonly item: ItemRef;
    readonly quantity: number;
};

export type PlaceOrderRequest = {
    readonly deliveryLocation: string;
    readonly paymentMode: string;
};

export type OrderLineDraft = {
    readonly item: ItemRef;
    readonly quantity: number;
    readonly unitPrice: number;
};

export type OrderDraft = {
    readonly userId: number;
    readonly totalAmount: number;
    readonly paymentMode: string;
    readonly deliveryLocation: string;
    readonly status: string;
    readonly lines: OrderLineDraft[];
};

export type OrderPlacement = {
    readonly order: Order;
    readonly skippedLines: CartLine[];
};

export type CatalogSummary = {
    readonly name: string;
    readonly photo: string | null;
};

export type OrderHistoryLine = OrderLine & {
    readonly catalogItem: CatalogSummary | null;
};

export type OrderHistoryEntry = Omit<Order, 'lines'> & {
    readonly lines: OrderHistoryLine[];
};

export type MissingItemAlert = {
    readonly type: 'missing_catalog_item';
    readonly item: ItemRef;
    readonly quantity: number;
    readonly userId: number;
    readonly orderId: number;
};

export type NewUser = Omit<User, 'id' | 'createdAt'>;

export type RegistrationRequest = {
    readonly fullName: string;
    readonly mobile: string;
    readonly email: string;
    readonly location: string;
    readonly latitude: string | null;
    readonly longitude: string | null;
    readonly password: string;
};

export type LoginRequest = {
    readonly mobile: string;
    readonly password: string;
};

export type LoginResult = {
    readonly sessionId: string;
    readonly user: User;
};
