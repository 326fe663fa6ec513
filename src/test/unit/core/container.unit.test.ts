/**
 * @fileoverview Unit tests for ServiceContainer
 */

import * as assert from 'assert';
import { ServiceContainer, createToken } from '../../../core/container';

interface Greeter {
  greet(name: string): string;
}

interface Counter {
  id: number;
}

const GreeterToken = createToken<Greeter>('Greeter');
const CounterToken = createToken<Counter>('Counter');
const MissingToken = createToken<Greeter>('Missing');

suite('ServiceContainer', () => {
  let container: ServiceContainer;
  let created: number;

  setup(() => {
    container = new ServiceContainer();
    created = 0;
  });

  function countingFactory(): Counter {
    created++;
    return { id: created };
  }

  suite('register and resolve', () => {
    test('singleton registrations are created once, lazily', () => {
      container.registerSingleton(CounterToken, countingFactory);
      assert.strictEqual(created, 0);

      const first = container.resolve(CounterToken);
      const second = container.resolve(CounterToken);

      assert.strictEqual(first, second);
      assert.strictEqual(created, 1);
    });

    test('registered instances resolve as-is', () => {
      const greeter: Greeter = { greet: (name) => `hello ${name}` };
      container.registerInstance(GreeterToken, greeter);

      assert.strictEqual(container.resolve(GreeterToken), greeter);
      assert.strictEqual(container.resolve(GreeterToken).greet('bob'), 'hello bob');
    });

    test('factories can resolve their dependencies', () => {
      container.registerSingleton(CounterToken, () => ({ id: 7 }));
      container.registerSingleton(GreeterToken, (c) => {
        const counter = c.resolve(CounterToken);
        return { greet: (name) => `${name}#${counter.id}` };
      });

      assert.strictEqual(container.resolve(GreeterToken).greet('x'), 'x#7');
    });

    test('throws for an unregistered token', () => {
      assert.throws(() => container.resolve(MissingToken), /Service not registered: Symbol\(Missing\)/);
    });
  });

  suite('isRegistered', () => {
    test('reports registered tokens only', () => {
      container.registerInstance(CounterToken, { id: 1 });

      assert.strictEqual(container.isRegistered(CounterToken), true);
      assert.strictEqual(container.isRegistered(MissingToken), false);
    });
  });
});
