/**
 * ITEM REFERENCES
 *
 * Cart lines and order lines point at a catalog item by (kind, id), where the
 * kind decides which catalog table holds the row. Everything that needs to
 * dispatch on the kind goes through matchItemRef instead of repeating the
 * branch at each call site.
 */

import {ItemKind, ItemRef, MenuItemRef, ServiceRef} from '../domain';

export const ITEM_KINDS = ['service', 'menu'] as const satisfies readonly ItemKind[];

export function serviceRef(id: number): ServiceRef {
  return {kind: 'service', id};
}

export function menuItemRef(id: number): MenuItemRef {
  return {kind: 'menu', id};
}

export function itemRef(kind: ItemKind, id: number): ItemRef {
  return kind === 'service' ? serviceRef(id) : menuItemRef(id);
}

export function isItemKind(value: string): value is ItemKind {
  return value === 'service' || value === 'menu';
}

export type ItemRefCases<T> = {
  readonly service: (id: number) => T;
  readonly menu: (id: number) => T;
};

export function matchItemRef<T>(ref: ItemRef, cases: ItemRefCases<T>): T {
  switch (ref.kind) {
    case 'service':
      return cases.service(ref.id);
    case 'menu':
      return cases.menu(ref.id);
  }
}

// Stable map key, e.g. "service:12"
export function itemRefKey(ref: ItemRef): string {
  return `${ref.kind}:${ref.id}`;
}

export function sameItem(a: ItemRef, b: ItemRef): boolean {
  return a.kind === b.kind && a.id === b.id;
}
