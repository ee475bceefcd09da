import { describe, it, expect, beforeEach } from 'vitest';
import { SecretObjectConflictError, SecretObjectNotFoundError } from '@/secrets/errors.js';
import type { ApplyOptions } from '@/secrets/types.js';
import { asStrings, fakeConnectionSecret, keyValues } from '@/testing/fixtures/secrets.js';
import { createInMemorySecretRepository } from './in-memory-secret-repository.js';
import type { InMemorySecretRepository } from './in-memory-secret-repository.js';

const KEY = { name: 'fake', namespace: 'fake-namespace' };

describe('InMemorySecretRepository', () => {
  let repository: InMemorySecretRepository;

  beforeEach(() => {
    repository = createInMemorySecretRepository();
  });

  describe('get', () => {
    it('rejects with SecretObjectNotFoundError for a missing object', async () => {
      await expect(repository.get(KEY)).rejects.toBeInstanceOf(SecretObjectNotFoundError);
    });

    it('returns a copy that callers cannot use to mutate the store', async () => {
      await repository.create(fakeConnectionSecret({ data: keyValues({ a: '1' }) }));

      const first = await repository.get(KEY);
      first.data['a']?.fill(0);
      first.labels['added'] = 'x';

      const second = await repository.get(KEY);
      expect(asStrings(second.data)).toEqual({ a: '1' });
      expect(second.labels).toEqual({});
    });
  });

  describe('create', () => {
    it('assigns a resourceVersion', async () => {
      await repository.create(fakeConnectionSecret());

      expect((await repository.get(KEY)).resourceVersion).toBe('1');
      expect(repository.size()).toBe(1);
    });

    it('rejects when the object already exists', async () => {
      await repository.create(fakeConnectionSecret());

      await expect(repository.create(fakeConnectionSecret())).rejects.toBeInstanceOf(
        SecretObjectConflictError,
      );
    });
  });

  describe('update', () => {
    it('replaces the object and bumps the resourceVersion', async () => {
      await repository.create(fakeConnectionSecret({ data: keyValues({ a: '1' }) }));
      const stored = await repository.get(KEY);

      await repository.update({ ...stored, data: keyValues({ b: '2' }) });

      const updated = await repository.get(KEY);
      expect(asStrings(updated.data)).toEqual({ b: '2' });
      expect(updated.resourceVersion).toBe('2');
    });

    it('rejects a stale resourceVersion', async () => {
      await repository.create(fakeConnectionSecret());
      const stale = await repository.get(KEY);
      await repository.update({ ...stale, labels: { first: 'writer' } });

      const error = await repository
        .update({ ...stale, labels: { second: 'writer' } })
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(SecretObjectConflictError);
      expect((error as SecretObjectConflictError).statusCode).toBe(409);
      expect((error as SecretObjectConflictError).context).toEqual({
        ...KEY,
        expectedResourceVersion: '1',
        actualResourceVersion: '2',
      });
    });

    it('rejects an update of a missing object', async () => {
      await expect(repository.update(fakeConnectionSecret())).rejects.toBeInstanceOf(
        SecretObjectNotFoundError,
      );
    });
  });

  describe('delete', () => {
    it('removes the object', async () => {
      await repository.create(fakeConnectionSecret());

      await repository.delete(fakeConnectionSecret());

      expect(repository.size()).toBe(0);
    });

    it('rejects when the object does not exist', async () => {
      await expect(repository.delete(fakeConnectionSecret())).rejects.toBeInstanceOf(
        SecretObjectNotFoundError,
      );
    });
  });

  describe('apply', () => {
    it('creates, then merges, then skips identical content', async () => {
      const merge: ApplyOptions = {
        merge: (current, desired) => ({
          ...desired,
          data: { ...current.data, ...desired.data },
          resourceVersion: current.resourceVersion,
        }),
      };

      await repository.apply(fakeConnectionSecret({ data: keyValues({ a: '1' }) }), merge);
      await repository.apply(fakeConnectionSecret({ data: keyValues({ b: '2' }) }), merge);
      await repository.apply(fakeConnectionSecret({ data: keyValues({ b: '2' }) }), merge);

      const stored = await repository.get(KEY);
      expect(asStrings(stored.data)).toEqual({ a: '1', b: '2' });
      expect(stored.resourceVersion).toBe('2');
    });
  });
});
