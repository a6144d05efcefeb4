import { describe, it, expect, beforeEach } from 'vitest';
import { main } from '../../src/cli';
import { ConsoleLogger } from '../../src/core/types/Logger';
import { ConnectionError } from '../../src/core/errors';
import { encodePayload } from '../../src/core/message';
import { MockConnectionManager } from '../mocks/MockConnection';
import { LineWriter } from '../helpers/LineWriter';

describe('main', () => {
  let stream: LineWriter;
  let stdout: LineWriter;
  let manager: MockConnectionManager;

  beforeEach(() => {
    stream = new LineWriter();
    stdout = new LineWriter();
    manager = new MockConnectionManager();
  });

  const run = (argv: string[]) =>
    main(argv, {}, {
      logger: new ConsoleLogger({ stream }),
      stdout,
      createConnection: manager.factory,
    });

  it('should take the mode from the script path and the arguments after it', async () => {
    manager.connection.subscribe('time', (message) => {
      message.respond(encodePayload('noon'));
    });

    const code = await run(['/usr/bin/node', '/usr/local/bin/nats-req', 'time', 'now?']);

    expect(code).toBe(0);
    expect(stdout.text()).toBe('noon\n');
    expect(manager.config?.name).toBe('NATS-REQ TOOL');
  });

  it('should exit 0 for version', async () => {
    const code = await run(['/usr/bin/node', '/usr/local/bin/nats-sub', '-v']);

    expect(code).toBe(0);
    expect(stream.lines()).toEqual(['nats-box v0.3.0']);
  });

  it('should exit 1 on usage errors', async () => {
    const code = await run(['/usr/bin/node', '/usr/local/bin/nats-sub']);

    expect(code).toBe(1);
    expect(stream.lines()[0]).toBe('Usage: nats-sub [-s server] [-creds file] [-t] <subject>');
  });

  it('should log fatal errors and exit 1', async () => {
    manager.connectError = ConnectionError.failed('connection refused');

    const code = await run(['/usr/bin/node', '/usr/local/bin/nats-pub', 'greetings', 'hello']);

    expect(code).toBe(1);
    expect(stream.lines()).toEqual(['connection refused']);
  });

  it('should log request failures the way the tool words them', async () => {
    const code = await run(['/usr/bin/node', '/usr/local/bin/nats-req', 'time', 'now?']);

    expect(code).toBe(1);
    expect(stream.lines()).toEqual(['no responders for request']);
  });

  it('should exit 1 when the server refuses the subscription', async () => {
    manager.connection.deny('secret');

    const code = await run(['/usr/bin/node', '/usr/local/bin/nats-sub', 'secret']);

    expect(code).toBe(1);
    expect(stream.lines()).toEqual(['Permissions Violation for Subscription to "secret"']);
  });

  it('should turn a lost subscription into exit 1', async () => {
    const running = run(['/usr/bin/node', '/usr/local/bin/nats-sub', 'updates']);
    await new Promise((resolve) => setTimeout(resolve, 0));

    manager.drop(new Error('stale connection'));

    await expect(running).resolves.toBe(1);
    expect(stream.lines()).toEqual([
      'Listening on [updates]',
      'Exiting: stale connection',
    ]);
  });
});
