/**
 * CATALOG LOOKUP
 *
 * Browse listings only show active items. Lookups by reference ignore the
 * status, because carts and orders keep pointing at items that were
 * deactivated after being added.
 */

import {CatalogItem, ItemKind} from '../domain';
import {AppEffects} from './effects';
import {itemNotFound, OrderingError} from './errors';
import {parseItemRef} from './validation';
import {Either, Left, Right} from 'purify-ts';

export function browseCatalog(
  kind: ItemKind
): (effects: Pick<AppEffects, 'catalog'>) => Promise<CatalogItem[]> {
  return (effects) => effects.catalog.listActive(kind);
}

/**
 * Details of a single item, addressed by untrusted route params
 * (item_type, item_id).
 */
export function getItemDetails(
  params: unknown
): (effects: Pick<AppEffects, 'catalog'>) => Promise<Either<OrderingError, CatalogItem>> {
  return async (effects) => {
    const request = parseItemRef(params);

    return request.caseOf<Promise<Either<OrderingError, CatalogItem>>>({
      Left: (error) => Promise.resolve(Left(error)),
      Right: async (ref): Promise<Either<OrderingError, CatalogItem>> => {
        const item = await effects.catalog.getByRef(ref);
        return item ? Right(item) : Left(itemNotFound(ref));
      }
    });
  };
}
