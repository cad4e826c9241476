import assert from 'node:assert/strict';
import { EventEmitter } from 'node:events';
import { test } from 'node:test';
import { installShutdownHandlers } from '../src/collector/shutdown';
import { createCapturingLogger } from './helpers';

test('the first signal aborts the loop and the second forces an exit', () => {
  const target = new EventEmitter();
  const controller = new AbortController();
  const exits: number[] = [];
  const { logger, lines } = createCapturingLogger();
  installShutdownHandlers({ controller, logger, target, exit: (code) => exits.push(code) });

  target.emit('SIGTERM', 'SIGTERM');
  assert.equal(controller.signal.aborted, true);
  assert.deepEqual(exits, []);

  target.emit('SIGINT', 'SIGINT');
  assert.deepEqual(exits, [130]);

  const forced = lines.find((line) => line.msg === 'Second shutdown signal received, exiting immediately');
  assert.ok(forced);
  assert.equal(forced.level, 40);
  assert.equal(forced.signal, 'SIGINT');
  assert.equal(forced.component, 'shutdown');
});

test('removing the handlers detaches every listener', () => {
  const target = new EventEmitter();
  const remove = installShutdownHandlers({
    controller: new AbortController(),
    logger: createCapturingLogger().logger,
    target,
    exit: () => undefined
  });
  assert.equal(target.listenerCount('SIGINT'), 1);
  assert.equal(target.listenerCount('SIGTERM'), 1);
  remove();
  assert.equal(target.listenerCount('SIGINT'), 0);
  assert.equal(target.listenerCount('SIGTERM'), 0);
});
