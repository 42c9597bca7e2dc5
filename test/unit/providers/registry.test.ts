import { describe, it, expect, vi } from 'vitest';
import { ProviderRegistry } from '../../../src/providers/registry.js';
import { isUnavailable, type ProviderRegistration } from '../../../src/providers/types.js';
import { ProviderError } from '../../../src/core/errors.js';
import { EventBus } from '../../../src/core/events.js';
import { MockProvider, failingRegistration, registrationFor } from '../../helpers/mock-provider.js';
import { makeConfig } from '../../helpers/fixtures.js';

function registry(table: ProviderRegistration[], events?: EventBus, timeoutMs?: number): ProviderRegistry {
  return new ProviderRegistry(table, { config: makeConfig(), env: {} }, { events, timeoutMs });
}

describe('ProviderRegistry', () => {
  it('should return Unavailable for an unregistered capability without throwing', async () => {
    const result = await registry([]).get('cloud');

    expect(isUnavailable(result)).toBe(true);
    expect(result).toEqual({ kind: 'unavailable', capability: 'cloud', reason: 'no provider registered', attempts: [] });
  });

  it('should throw a typed error from getRequired for the same capability', async () => {
    const providers = registry([]);

    await expect(providers.getRequired('cloud')).rejects.toBeInstanceOf(ProviderError);
    await expect(providers.getRequired('cloud')).rejects.toMatchObject({ capability: 'cloud' });
  });

  it('should construct lazily and cache per capability', async () => {
    const git = new MockProvider('git', ['version-control']);
    const registration = registrationFor(git);
    const providers = registry([registration]);

    expect(registration.created).toBe(0);
    expect(await providers.get('version-control')).toBe(git);
    expect(await providers.get('version-control')).toBe(git);
    expect(registration.created).toBe(1);
  });

  it('should share one construction between concurrent lookups', async () => {
    const registration = registrationFor(new MockProvider('git', ['version-control']));
    const providers = registry([registration]);

    await Promise.all([providers.get('version-control'), providers.get('version-control')]);

    expect(registration.created).toBe(1);
  });

  it('should pick the first provider that constructs, in registration order', async () => {
    const backup = new MockProvider('backup-ai', ['ai']);
    const providers = registry([
      failingRegistration('primary-ai', ['ai'], 'OPENAI_API_KEY is not set'),
      registrationFor(backup),
    ]);

    expect(await providers.get('ai')).toBe(backup);
    expect(providers.selections()).toEqual([{ capability: 'ai', provider: 'backup-ai' }]);
  });

  it('should skip a provider whose connection check fails', async () => {
    const unhealthy = new MockProvider('docker', ['container'], undefined, false);
    const result = await registry([registrationFor(unhealthy)]).get('container');

    expect(isUnavailable(result) && result.attempts).toEqual([{ provider: 'docker', reason: 'connection check failed' }]);
  });

  it('should record every failed attempt in the Unavailable reason', async () => {
    const providers = registry([
      failingRegistration('one', ['ai'], 'no key'),
      failingRegistration('two', ['ai'], 'no network'),
    ]);
    const result = await providers.get('ai');

    expect(isUnavailable(result) && result.reason).toBe('one: no key; two: no network');
    expect(providers.selections()).toEqual([{ capability: 'ai', provider: null, reason: 'one: no key; two: no network' }]);
  });

  it('should give up on a construction that exceeds the timeout', async () => {
    const slow: ProviderRegistration = {
      name: 'slow',
      capabilities: ['database'],
      create: () => new Promise(() => {}),
    };
    const result = await registry([slow], undefined, 20).get('database');

    expect(isUnavailable(result) && result.reason).toBe('slow: timed out after 20ms');
  });

  it('should build a provider serving two capabilities once', async () => {
    const multi = new MockProvider('forge', ['version-control', 'cloud']);
    const registration = registrationFor(multi);
    const providers = registry([registration]);

    expect(await providers.get('version-control')).toBe(multi);
    expect(await providers.get('cloud')).toBe(multi);
    expect(registration.created).toBe(1);
  });

  it('should emit selections on the event bus', async () => {
    const events = new EventBus();
    const listener = vi.fn();
    events.on('provider:selected', listener);

    await registry([registrationFor(new MockProvider('git', ['version-control']))], events).get('version-control');

    expect(listener).toHaveBeenCalledWith({ capability: 'version-control', provider: 'git' });
  });

  it('should dispose providers and construct afresh after teardown', async () => {
    const git = new MockProvider('git', ['version-control']);
    const registration = registrationFor(git);
    const providers = registry([registration]);
    await providers.get('version-control');

    await providers.teardown();
    expect(git.disposed).toBe(true);

    await providers.get('version-control');
    expect(registration.created).toBe(2);
  });

  it('should list candidates for a capability', () => {
    const providers = registry([
      registrationFor(new MockProvider('a', ['ai'])),
      registrationFor(new MockProvider('git', ['version-control'])),
      registrationFor(new MockProvider('b', ['ai'])),
    ]);
    expect(providers.candidates('ai')).toEqual(['a', 'b']);
  });
});
