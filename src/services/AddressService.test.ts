import { describe, it, expect, beforeEach } from 'vitest';
import { AddressService } from './AddressService';
import { AddressRepository } from '../repositories/AddressRepository';
import { ConflictError, NotFoundError, ValidationError } from '../utils/error';
import type { AddressCreateData } from '../types';

const TRACE = 'test-trace';
const ADDRESS_ID = '3f2c1e8a-4b5d-4c6e-8f7a-9b0c1d2e3f4a';

const baseAddress: AddressCreateData = {
  id: ADDRESS_ID,
  street: 'A',
  city: 'B',
  state: 'NY',
  postal_code: '10027',
  country: 'USA',
};

describe('AddressService', () => {
  let service: AddressService;

  beforeEach(() => {
    service = new AddressService(new AddressRepository());
  });

  it('stores and echoes a new address with timestamps', async () => {
    const created = await service.createAddress(baseAddress, TRACE);

    expect(created).toMatchObject(baseAddress);
    expect(created.created_at).toBe(created.updated_at);
    expect(await service.getAddressById(ADDRESS_ID, TRACE)).toEqual(created);
  });

  it('rejects a duplicate ID and leaves the original untouched', async () => {
    const original = await service.createAddress(baseAddress, TRACE);

    await expect(
      service.createAddress({ ...baseAddress, street: 'Somewhere else' }, TRACE)
    ).rejects.toThrow(new ConflictError('Address with this ID already exists'));

    expect(await service.getAddressById(ADDRESS_ID, TRACE)).toEqual(original);
  });

  it('keeps fields that are absent from a partial update', async () => {
    await service.createAddress(baseAddress, TRACE);

    const updated = await service.updateAddress(ADDRESS_ID, { city: 'C' }, TRACE);

    expect(updated.street).toBe('A');
    expect(updated.city).toBe('C');
    expect(updated.id).toBe(ADDRESS_ID);
    expect(await service.getAddressById(ADDRESS_ID, TRACE)).toEqual(updated);
  });

  it('fails with NotFound for unknown IDs', async () => {
    await expect(service.getAddressById(ADDRESS_ID, TRACE)).rejects.toThrow(NotFoundError);
    await expect(service.updateAddress(ADDRESS_ID, { city: 'C' }, TRACE)).rejects.toThrow(
      'Address not found'
    );
  });

  it('re-validates the merged record', async () => {
    await service.createAddress(baseAddress, TRACE);

    await expect(service.updateAddress(ADDRESS_ID, { city: '' }, TRACE)).rejects.toThrow(
      ValidationError
    );
    expect((await service.getAddressById(ADDRESS_ID, TRACE)).city).toBe('B');
  });

  it('filters by every provided field', async () => {
    const second = '5a6b7c8d-9e0f-4a1b-8c2d-3e4f5a6b7c8d';
    await service.createAddress({ ...baseAddress, city: 'NY', state: 'NY' }, TRACE);
    await service.createAddress({ ...baseAddress, id: second, city: 'NY', state: 'CA' }, TRACE);

    const results = await service.getAddresses({ city: 'NY', state: 'CA' }, TRACE);

    expect(results.map(a => a.id)).toEqual([second]);
  });
});
