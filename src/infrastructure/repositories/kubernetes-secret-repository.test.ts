import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { Mock } from 'vitest';
import type { V1Secret } from '@kubernetes/client-node';
import { AbortedError } from '@/core/errors.js';
import { SecretObjectNotFoundError, isNotFound } from '@/secrets/errors.js';
import { asStrings, fakeConnectionSecret, keyValues } from '@/testing/fixtures/secrets.js';
import {
  createKubernetesSecretRepository,
  fromV1Secret,
  toV1Secret,
} from './kubernetes-secret-repository.js';
import type { SecretsApi } from './kubernetes-secret-repository.js';

const KEY = { name: 'fake', namespace: 'fake-namespace' };

type MockSecretsApi = { [K in keyof SecretsApi]: Mock<SecretsApi[K]> };

function createMockApi(): MockSecretsApi {
  return {
    readNamespacedSecret: vi.fn<SecretsApi['readNamespacedSecret']>(),
    createNamespacedSecret: vi.fn<SecretsApi['createNamespacedSecret']>(),
    replaceNamespacedSecret: vi.fn<SecretsApi['replaceNamespacedSecret']>(),
    deleteNamespacedSecret: vi.fn<SecretsApi['deleteNamespacedSecret']>(),
  };
}

/** Shaped like the client's ApiException: an Error with a numeric HTTP code. */
function apiException(code: number): Error {
  return Object.assign(new Error(`HTTP-Code: ${code.toString()}`), { code });
}

function storedSecret(data: Record<string, string>, resourceVersion = '7'): V1Secret {
  return {
    apiVersion: 'v1',
    kind: 'Secret',
    metadata: { ...KEY, resourceVersion, labels: { app: 'api' } },
    type: 'Opaque',
    data,
  };
}

describe('fromV1Secret / toV1Secret', () => {
  it('decodes base64 data into Buffers', () => {
    const object = fromV1Secret(storedSecret({ password: 'dGVzdC1zZWNyZXQ=' }), KEY);

    expect(object).toMatchObject({
      ...KEY,
      type: 'Opaque',
      labels: { app: 'api' },
      annotations: {},
      resourceVersion: '7',
    });
    expect(asStrings(object.data)).toEqual({ password: 'test-secret' });
  });

  it('decodes a __proto__ data key as an own entry', () => {
    const object = fromV1Secret(
      storedSecret(Object.fromEntries<string>([['__proto__', 'cA=='], ['other', 'bw==']])),
      KEY,
    );

    expect(Object.keys(object.data).sort()).toEqual(['__proto__', 'other']);
    expect(Object.getOwnPropertyDescriptor(object.data, '__proto__')?.value).toEqual(
      Buffer.from('p'),
    );
  });

  it('falls back to the key and Opaque for sparse API objects', () => {
    const object = fromV1Secret({}, KEY);

    expect(object).toEqual({
      ...KEY,
      type: 'Opaque',
      labels: {},
      annotations: {},
      data: {},
    });
  });

  it('encodes data as base64 and omits an absent resourceVersion', () => {
    const secret = toV1Secret(fakeConnectionSecret({ data: keyValues({ password: 'test-secret' }) }));

    expect(secret.data).toEqual({ password: 'dGVzdC1zZWNyZXQ=' });
    expect(secret.metadata).toEqual({
      name: 'fake',
      namespace: 'fake-namespace',
      labels: {},
      annotations: {},
    });
  });
});

describe('KubernetesSecretRepository', () => {
  let api: MockSecretsApi;

  beforeEach(() => {
    api = createMockApi();
  });

  describe('get', () => {
    it('reads the namespaced secret', async () => {
      api.readNamespacedSecret.mockResolvedValue(storedSecret({ key1: 'dmFsdWUx' }));

      const object = await createKubernetesSecretRepository(api).get(KEY);

      expect(api.readNamespacedSecret).toHaveBeenCalledWith({
        name: 'fake',
        namespace: 'fake-namespace',
      });
      expect(asStrings(object.data)).toEqual({ key1: 'value1' });
    });

    it('maps a 404 to SecretObjectNotFoundError', async () => {
      const notFound = apiException(404);
      api.readNamespacedSecret.mockRejectedValue(notFound);

      const error = await createKubernetesSecretRepository(api)
        .get(KEY)
        .catch((e: unknown) => e);

      expect(isNotFound(error)).toBe(true);
      expect((error as SecretObjectNotFoundError).cause).toBe(notFound);
    });

    it('rethrows other API errors unchanged', async () => {
      const forbidden = apiException(403);
      api.readNamespacedSecret.mockRejectedValue(forbidden);

      await expect(createKubernetesSecretRepository(api).get(KEY)).rejects.toBe(forbidden);
    });

    it('rejects with AbortedError when the signal is already aborted', async () => {
      const controller = new AbortController();
      controller.abort();

      await expect(
        createKubernetesSecretRepository(api).get(KEY, { abortSignal: controller.signal }),
      ).rejects.toBeInstanceOf(AbortedError);
      expect(api.readNamespacedSecret).not.toHaveBeenCalled();
    });
  });

  describe('create / update / delete', () => {
    it('creates without a resourceVersion', async () => {
      api.createNamespacedSecret.mockResolvedValue({});

      await createKubernetesSecretRepository(api).create(
        fakeConnectionSecret({ resourceVersion: '3' }),
      );

      const body = api.createNamespacedSecret.mock.calls[0]?.[0].body;
      expect(api.createNamespacedSecret.mock.calls[0]?.[0].namespace).toBe('fake-namespace');
      expect(body?.metadata?.resourceVersion).toBeUndefined();
      expect(body?.kind).toBe('Secret');
    });

    it('replaces with the resourceVersion it was given', async () => {
      api.replaceNamespacedSecret.mockResolvedValue({});

      await createKubernetesSecretRepository(api).update(
        fakeConnectionSecret({ data: keyValues({ key3: 'value3' }), resourceVersion: '9' }),
      );

      const param = api.replaceNamespacedSecret.mock.calls[0]?.[0];
      expect(param?.name).toBe('fake');
      expect(param?.body.metadata?.resourceVersion).toBe('9');
      expect(param?.body.data).toEqual({ key3: 'dmFsdWUz' });
    });

    it('surfaces a 409 conflict from replace as-is', async () => {
      const conflict = apiException(409);
      api.replaceNamespacedSecret.mockRejectedValue(conflict);

      await expect(
        createKubernetesSecretRepository(api).update(fakeConnectionSecret()),
      ).rejects.toBe(conflict);
    });

    it('deletes by name and namespace', async () => {
      api.deleteNamespacedSecret.mockResolvedValue({});

      await createKubernetesSecretRepository(api).delete(fakeConnectionSecret());

      expect(api.deleteNamespacedSecret).toHaveBeenCalledWith({
        name: 'fake',
        namespace: 'fake-namespace',
      });
    });

    it('maps a 404 on delete to SecretObjectNotFoundError', async () => {
      api.deleteNamespacedSecret.mockRejectedValue(apiException(404));

      await expect(
        createKubernetesSecretRepository(api).delete(fakeConnectionSecret()),
      ).rejects.toBeInstanceOf(SecretObjectNotFoundError);
    });
  });

  describe('apply', () => {
    it('creates the secret when the read returns 404', async () => {
      api.readNamespacedSecret.mockRejectedValue(apiException(404));
      api.createNamespacedSecret.mockResolvedValue({});

      await createKubernetesSecretRepository(api).apply(
        fakeConnectionSecret({ data: keyValues({ key1: 'value1' }) }),
      );

      expect(api.createNamespacedSecret).toHaveBeenCalledOnce();
      expect(api.replaceNamespacedSecret).not.toHaveBeenCalled();
    });

    it('replaces the secret when the content changes', async () => {
      api.readNamespacedSecret.mockResolvedValue({
        metadata: { ...KEY, resourceVersion: '4' },
        type: 'Opaque',
        data: { key1: 'dmFsdWUx' },
      });
      api.replaceNamespacedSecret.mockResolvedValue({});

      await createKubernetesSecretRepository(api).apply(
        fakeConnectionSecret({ type: 'Opaque', data: keyValues({ key2: 'value2' }) }),
        {
          merge: (current, desired) => ({
            ...desired,
            data: { ...current.data, ...desired.data },
            resourceVersion: current.resourceVersion,
          }),
        },
      );

      const body = api.replaceNamespacedSecret.mock.calls[0]?.[0].body;
      expect(body?.data).toEqual({ key1: 'dmFsdWUx', key2: 'dmFsdWUy' });
      expect(body?.metadata?.resourceVersion).toBe('4');
    });
  });
});
