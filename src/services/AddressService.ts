/**
 * Business logic service for addresses
 * Addresses use strict create: an ID that already exists is rejected
 */

import type { AddressRepository } from '../repositories/AddressRepository';
import type { AddressCreateData, AddressFilters, AddressUpdateData, IAddress } from '../types';
import { addressSchema } from '../schemas';
import { NotFoundError, ValidationError } from '../utils/error';
import { logger } from '../utils/logger';
import { formatZodIssues } from '../utils/validation';

export class AddressService {
  constructor(private readonly addressRepository: AddressRepository) {}

  public async createAddress(data: AddressCreateData, traceId: string): Promise<IAddress> {
    const log = logger.withTrace(traceId);
    const now = new Date().toISOString();

    const address: IAddress = { ...data, created_at: now, updated_at: now };
    const created = await this.addressRepository.insert(address, traceId);

    log.info('Address created', { id: created.id });
    return created;
  }

  public async getAddresses(filters: AddressFilters, traceId: string): Promise<IAddress[]> {
    const log = logger.withTrace(traceId);

    log.info('Fetching addresses', { filters });
    const addresses = await this.addressRepository.findAll(filters, traceId);
    log.info('Successfully fetched addresses', { returned: addresses.length });

    return addresses;
  }

  public async getAddressById(id: string, traceId: string): Promise<IAddress> {
    const address = await this.addressRepository.findByKey(id, traceId);

    if (!address) {
      logger.withTrace(traceId).warn('Address not found', { id });
      throw new NotFoundError('Address');
    }

    return address;
  }

  /**
   * Apply the fields present in the update over the stored address
   */
  public async updateAddress(
    id: string,
    updates: AddressUpdateData,
    traceId: string
  ): Promise<IAddress> {
    const log = logger.withTrace(traceId);
    const existing = await this.getAddressById(id, traceId);

    const result = addressSchema.safeParse({
      ...existing,
      ...updates,
      id: existing.id,
      created_at: existing.created_at,
      updated_at: new Date().toISOString(),
    });

    if (!result.success) {
      log.warn('Merged address failed validation', { id });
      throw new ValidationError('Validation failed', formatZodIssues(result.error));
    }

    const updated = await this.addressRepository.save(result.data, traceId);
    log.info('Address updated', { id, fields: Object.keys(updates) });

    return updated;
  }
}
