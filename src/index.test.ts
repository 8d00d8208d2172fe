import test from 'node:test';
import assert from 'node:assert/strict';
import {
  Dispatcher,
  RegistrationExhaustedError,
  SubscriberRegistry,
  failedSubscribers,
  isDispatchError,
  summarizeOutcomes,
  type Capability,
} from './index.js';

interface PriceChanged {
  sku: string;
  cents: number;
}

test('public API: one round through the package entry point', async () => {
  const registry = new SubscriberRegistry<PriceChanged>();
  const dispatcher = new Dispatcher<PriceChanged>({ registry, config: { concurrencyLimit: 2, perCallTimeoutMs: 200 } });

  const cache: Capability<PriceChanged> = () => {};
  const search: Capability<PriceChanged> = async ({ sku }) => {
    throw new Error(`index for ${sku} is read-only`);
  };
  dispatcher.register(cache, { label: 'cache' });
  const searchId = dispatcher.register(search, { label: 'search' });

  const result = await dispatcher.notify({ sku: 'sku-1', cents: 499 });

  assert.deepEqual(summarizeOutcomes(result), { total: 2, delivered: 1, failed: 1, timedOut: 0 });
  assert.deepEqual(failedSubscribers(result), [searchId]);
  const outcome = result.outcomes.get(searchId);
  assert.ok(outcome?.status === 'failed' && isDispatchError(outcome.error));
});

test('public API: errors carry stable codes', () => {
  const err = new RegistrationExhaustedError(10);
  assert.ok(isDispatchError(err));
  assert.equal(err.code, 'REGISTRATION_EXHAUSTED');
  assert.equal(isDispatchError(new Error('plain')), false);
});
