import { describe, it, expect, beforeEach } from 'vitest';
import { AgeService } from './AgeService';
import { AgeRepository } from '../repositories/AgeRepository';
import { NotFoundError, ValidationError } from '../utils/error';
import type { IAge } from '../types';

const TRACE = 'test-trace';

const ada: IAge = { person_name: 'Ada Lovelace', birth_date: '1815-12-10', current_age: 36 };

describe('AgeService', () => {
  let service: AgeService;

  beforeEach(() => {
    service = new AgeService(new AgeRepository());
  });

  it('overwrites on repeated create', async () => {
    await service.createAge(ada, TRACE);
    await service.createAge({ ...ada, current_age: 37 }, TRACE);

    expect(await service.getAges(TRACE)).toEqual([{ ...ada, current_age: 37 }]);
  });

  it('rejects a replace whose key differs from the payload, existing or not', async () => {
    await expect(service.replaceAge('Someone Else', ada, TRACE)).rejects.toThrow(ValidationError);

    await service.createAge(ada, TRACE);
    await expect(service.replaceAge('Someone Else', ada, TRACE)).rejects.toThrow(
      'Person name in URL must match payload'
    );
  });

  it('creates on replace when the key is new', async () => {
    const replaced = await service.replaceAge('Ada Lovelace', ada, TRACE);

    expect(replaced).toEqual(ada);
    expect(await service.getAge('Ada Lovelace', TRACE)).toEqual(ada);
  });

  it('deletes existing records and reports missing ones', async () => {
    await service.createAge(ada, TRACE);

    await service.deleteAge('Ada Lovelace', TRACE);

    await expect(service.getAge('Ada Lovelace', TRACE)).rejects.toThrow(
      new NotFoundError('Age record')
    );
    await expect(service.deleteAge('Ada Lovelace', TRACE)).rejects.toThrow('Age record not found');
  });
});
