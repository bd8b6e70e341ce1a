import { describe, it, expect, beforeEach } from 'vitest';
import request from 'supertest';
import type { Application } from 'express';
import { createApp } from './app';
import { createDataStore } from '../core/DataStore';
import { WELCOME_MESSAGE } from './routes';

const ADDRESS_ID = '3f2c1e8a-4b5d-4c6e-8f7a-9b0c1d2e3f4a';
const UNKNOWN_ID = '9d9d9d9d-9d9d-4d9d-8d9d-9d9d9d9d9d9d';
const JOB_ID = '550e8400-e29b-41d4-a716-446655440000';
const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/;

const addressBody = {
  id: ADDRESS_ID,
  street: 'A',
  city: 'B',
  state: 'NY',
  postal_code: '10027',
  country: 'USA',
};

const personBody = {
  uni: 'al1815',
  first_name: 'Ada',
  last_name: 'Lovelace',
  email: 'ada@example.com',
  birth_date: '1815-12-10',
  addresses: [
    {
      id: 'aaaaaaaa-aaaa-4aaa-8aaa-aaaaaaaaaaaa',
      street: '1 Rue',
      city: 'Paris',
      state: 'IDF',
      postal_code: '75001',
      country: 'France',
    },
    {
      id: 'bbbbbbbb-bbbb-4bbb-8bbb-bbbbbbbbbbbb',
      street: '1 Via',
      city: 'Rome',
      state: 'Lazio',
      postal_code: '00100',
      country: 'Italy',
    },
  ],
};

const ageBody = { person_name: 'Ada Lovelace', birth_date: '1815-12-10', current_age: 36 };

const jobBody = {
  id: JOB_ID,
  title: 'Software Engineer',
  company: 'Example Corp',
  start_date: '2023-06-01',
};

describe('API', () => {
  let app: Application;

  beforeEach(() => {
    app = createApp(createDataStore(), { resolveHostAddress: async () => '127.0.0.1' });
  });

  describe('root and health', () => {
    it('greets on the root path', async () => {
      const res = await request(app).get('/');

      expect(res.status).toBe(200);
      expect(res.body.message).toBe(WELCOME_MESSAGE);
      expect(res.headers['x-trace-id']).toMatch(UUID_PATTERN);
    });

    it('echoes the query value', async () => {
      const res = await request(app).get('/health').query({ echo: 'hello' });

      expect(res.status).toBe(200);
      expect(res.body).toMatchObject({
        status: 200,
        status_message: 'OK',
        ip_address: '127.0.0.1',
        echo: 'hello',
        path_echo: null,
      });
      expect(res.body.timestamp).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z$/);
    });

    it('echoes the path segment', async () => {
      const res = await request(app).get('/health/pong');

      expect(res.status).toBe(200);
      expect(res.body.echo).toBeNull();
      expect(res.body.path_echo).toBe('pong');
    });

    it('fails the request when the host address cannot be resolved', async () => {
      const failing = createApp(createDataStore(), {
        resolveHostAddress: async () => {
          throw new Error('getaddrinfo ENOTFOUND');
        },
      });

      const res = await request(failing).get('/health');

      expect(res.status).toBe(500);
      expect(res.body.success).toBe(false);
      expect(res.body.message).toBe('Internal server error');
    });
  });

  describe('addresses', () => {
    it('creates, fetches and lists an address', async () => {
      const created = await request(app).post('/addresses').send(addressBody);
      expect(created.status).toBe(201);
      expect(created.body).toMatchObject(addressBody);

      const fetched = await request(app).get(`/addresses/${ADDRESS_ID}`);
      expect(fetched.status).toBe(200);
      expect(fetched.body).toEqual(created.body);

      const listed = await request(app).get('/addresses').query({ city: 'B', country: 'USA' });
      expect(listed.body).toEqual([created.body]);
    });

    it('rejects a duplicate ID with 400 and keeps the original', async () => {
      await request(app).post('/addresses').send(addressBody);

      const res = await request(app)
        .post('/addresses')
        .send({ ...addressBody, street: 'Elsewhere' });

      expect(res.status).toBe(400);
      expect(res.body.message).toBe('Address with this ID already exists');
      const fetched = await request(app).get(`/addresses/${ADDRESS_ID}`);
      expect(fetched.body.street).toBe('A');
    });

    it('treats an ID differing only in letter case as the same address', async () => {
      await request(app).post('/addresses').send(addressBody);

      const res = await request(app)
        .post('/addresses')
        .send({ ...addressBody, id: ADDRESS_ID.toUpperCase(), street: 'Elsewhere' });

      expect(res.status).toBe(400);
      expect(res.body.message).toBe('Address with this ID already exists');
      const listed = await request(app).get('/addresses');
      expect(listed.body).toHaveLength(1);
      const fetched = await request(app).get(`/addresses/${ADDRESS_ID.toUpperCase()}`);
      expect(fetched.status).toBe(200);
      expect(fetched.body.street).toBe('A');
    });

    it('returns field errors for an invalid body', async () => {
      const { city: _city, ...withoutCity } = addressBody;

      const res = await request(app).post('/addresses').send(withoutCity);

      expect(res.status).toBe(400);
      expect(res.body.message).toBe('Validation failed');
      expect(res.body.details).toEqual([
        { field: 'city', message: 'Required', code: 'invalid_type' },
      ]);
      expect((await request(app).get('/addresses')).body).toEqual([]);
    });

    it('validates the path ID and reports unknown addresses', async () => {
      const malformed = await request(app).get('/addresses/not-a-uuid');
      expect(malformed.status).toBe(400);

      const missing = await request(app).get(`/addresses/${UNKNOWN_ID}`);
      expect(missing.status).toBe(404);
      expect(missing.body.message).toBe('Address not found');

      const patch = await request(app).patch(`/addresses/${UNKNOWN_ID}`).send({ city: 'C' });
      expect(patch.status).toBe(404);
    });

    it('patches only the provided fields', async () => {
      await request(app).post('/addresses').send(addressBody);

      const res = await request(app).patch(`/addresses/${ADDRESS_ID}`).send({ city: 'C' });

      expect(res.status).toBe(200);
      expect(res.body).toMatchObject({ ...addressBody, street: 'A', city: 'C' });
    });
  });

  describe('persons', () => {
    it('ignores a client-supplied ID', async () => {
      const res = await request(app)
        .post('/persons')
        .send({ ...personBody, id: UNKNOWN_ID });

      expect(res.status).toBe(201);
      expect(res.body.id).toMatch(UUID_PATTERN);
      expect(res.body.id).not.toBe(UNKNOWN_ID);
      expect(res.body.phone).toBeNull();
    });

    it('round-trips a created person', async () => {
      const created = await request(app).post('/persons').send(personBody);

      const fetched = await request(app).get(`/persons/${created.body.id}`);

      expect(fetched.status).toBe(200);
      expect(fetched.body).toEqual(created.body);
      expect(fetched.body.addresses).toEqual(personBody.addresses);
    });

    it('finds a person by the city of any embedded address', async () => {
      const created = await request(app).post('/persons').send(personBody);

      const rome = await request(app).get('/persons').query({ city: 'Rome' });
      const berlin = await request(app).get('/persons').query({ city: 'Berlin' });

      expect(rome.body.map((p: { id: string }) => p.id)).toEqual([created.body.id]);
      expect(berlin.body).toEqual([]);
    });

    it('patches a person and rejects malformed updates', async () => {
      const created = await request(app).post('/persons').send(personBody);

      const updated = await request(app)
        .patch(`/persons/${created.body.id}`)
        .send({ email: 'countess@example.com' });
      expect(updated.status).toBe(200);
      expect(updated.body.email).toBe('countess@example.com');
      expect(updated.body.first_name).toBe('Ada');

      const invalid = await request(app)
        .patch(`/persons/${created.body.id}`)
        .send({ email: 'not-an-email' });
      expect(invalid.status).toBe(400);
      expect(invalid.body.details).toEqual([
        { field: 'email', message: 'Invalid email format', code: 'invalid_string' },
      ]);
    });
  });

  describe('ages', () => {
    it('supports the full create, replace and delete cycle', async () => {
      const created = await request(app).post('/ages').send(ageBody);
      expect(created.status).toBe(201);
      expect(created.body).toEqual(ageBody);

      const replaced = await request(app)
        .put('/ages/Ada%20Lovelace')
        .send({ ...ageBody, current_age: 37 });
      expect(replaced.status).toBe(200);
      expect(replaced.body.current_age).toBe(37);

      const listed = await request(app).get('/ages');
      expect(listed.body).toEqual([{ ...ageBody, current_age: 37 }]);

      const deleted = await request(app).delete('/ages/Ada%20Lovelace');
      expect(deleted.status).toBe(204);

      const missing = await request(app).get('/ages/Ada%20Lovelace');
      expect(missing.status).toBe(404);
      expect(missing.body.message).toBe('Age record not found');
    });

    it('rejects a replace whose path differs from person_name', async () => {
      const res = await request(app).put('/ages/Someone').send(ageBody);

      expect(res.status).toBe(400);
      expect(res.body.message).toBe('Person name in URL must match payload');
    });

    it('defaults current_age to null', async () => {
      const res = await request(app)
        .post('/ages')
        .send({ person_name: 'Grace Hopper', birth_date: '1906-12-09' });

      expect(res.body).toEqual({
        person_name: 'Grace Hopper',
        birth_date: '1906-12-09',
        current_age: null,
      });
    });

    it('reports deleting an unknown record', async () => {
      const res = await request(app).delete('/ages/Nobody');

      expect(res.status).toBe(404);
    });
  });

  describe('jobs', () => {
    it('applies defaults and generates an ID when none is given', async () => {
      const { id: _id, ...withoutId } = jobBody;

      const res = await request(app).post('/jobs').send(withoutId);

      expect(res.status).toBe(201);
      expect(res.body.id).toMatch(UUID_PATTERN);
      expect(res.body.end_date).toBeNull();
      expect(res.body.is_current).toBe(true);
    });

    it('replaces by matching ID and rejects a mismatch', async () => {
      await request(app).post('/jobs').send(jobBody);

      const replaced = await request(app)
        .put(`/jobs/${JOB_ID}`)
        .send({ ...jobBody, end_date: '2025-09-01', is_current: false });
      expect(replaced.status).toBe(200);
      expect(replaced.body).toEqual({ ...jobBody, end_date: '2025-09-01', is_current: false });

      const mismatch = await request(app).put(`/jobs/${UNKNOWN_ID}`).send(jobBody);
      expect(mismatch.status).toBe(400);
      expect(mismatch.body.message).toBe('Job ID in URL must match payload');
    });

    it('stores an upper-case job ID in lower case', async () => {
      const created = await request(app)
        .post('/jobs')
        .send({ ...jobBody, id: JOB_ID.toUpperCase() });
      expect(created.body.id).toBe(JOB_ID);

      const fetched = await request(app).get(`/jobs/${JOB_ID}`);
      expect(fetched.status).toBe(200);
      expect(fetched.body.id).toBe(JOB_ID);
    });

    it('deletes a job so that it can no longer be fetched', async () => {
      await request(app).post('/jobs').send(jobBody);

      expect((await request(app).delete(`/jobs/${JOB_ID}`)).status).toBe(204);
      expect((await request(app).get(`/jobs/${JOB_ID}`)).status).toBe(404);
      expect((await request(app).delete(`/jobs/${JOB_ID}`)).status).toBe(404);
    });
  });

  describe('errors', () => {
    it('reports malformed JSON', async () => {
      const res = await request(app)
        .post('/ages')
        .set('Content-Type', 'application/json')
        .send('{"person_name": ');

      expect(res.status).toBe(400);
      expect(res.body.message).toBe('Malformed JSON body');
    });

    it('rejects an oversized body with 413', async () => {
      const limited = createApp(createDataStore(), {
        maxRequestSize: '1kb',
        resolveHostAddress: async () => '127.0.0.1',
      });

      const res = await request(limited)
        .post('/ages')
        .send({ ...ageBody, person_name: 'x'.repeat(2048) });

      expect(res.status).toBe(413);
      expect(res.body).toMatchObject({ success: false, message: 'Request body too large' });
    });

    it('returns 404 for unknown routes', async () => {
      const res = await request(app).get('/nowhere');

      expect(res.status).toBe(404);
      expect(res.body).toMatchObject({
        success: false,
        message: 'Route GET /nowhere not found',
      });
      expect(res.body.traceId).toBe(res.headers['x-trace-id']);
    });
  });
});
