import {browseCatalog, getItemDetails} from '../pure/catalog';
import {menuItemRef, serviceRef} from '../pure/itemRef';
import {catalogItem, InMemoryEffects} from './support/inMemoryEffects';

function setup(): InMemoryEffects {
  const effects = new InMemoryEffects();
  effects.putCatalogItem(catalogItem(serviceRef(2), 80));
  effects.putCatalogItem(catalogItem(serviceRef(1), 100));
  effects.putCatalogItem(catalogItem(serviceRef(3), 60, { status: 'inactive' }));
  effects.putCatalogItem(catalogItem(menuItemRef(1), 25));
  return effects;
}

describe('browseCatalog', () => {
  it('lists active items of one kind', async () => {
    const services = await browseCatalog('service')(setup());

    expect(services.map(item => item.ref)).toEqual([serviceRef(1), serviceRef(2)]);
  });
});

describe('getItemDetails', () => {
  it('returns an inactive item addressed directly', async () => {
    const result = await getItemDetails({ item_type: 'service', item_id: '3' })(setup());

    expect(result.extract()).toEqual(catalogItem(serviceRef(3), 60, { status: 'inactive' }));
  });

  it('reports an unknown item', async () => {
    const result = await getItemDetails({ item_type: 'menu', item_id: '9' })(setup());

    expect(result.extract()).toEqual({ type: 'item_not_found', item: menuItemRef(9) });
  });

  it('propagates a lookup failure', async () => {
    const effects = setup();
    const failingEffects = {
      catalog: { ...effects.catalog, getByRef: jest.fn().mockRejectedValue(new Error('db down')) },
    };

    await expect(getItemDetails({ item_type: 'service', item_id: '1' })(failingEffects)).rejects.toThrow('db down');
  });

  it('rejects malformed params', async () => {
    const result = await getItemDetails({ item_type: 'menu', item_id: 'nine' })(setup());

    expect(result.extract()).toMatchObject({ type: 'validation' });
  });
});
