import { describe, it, expect, vi, afterEach, beforeAll, afterAll } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { loadConfig, DEFAULT_COMMAND_TIMEOUT, DEFAULT_CONN_TIMEOUT } from '../../src/config.js';
import { createConsoleLogger } from '../../src/logger.js';
import { createSessionContext } from '../../src/session/context.js';
import { HostDirectory } from '../../src/directory/host-directory.js';
import { StartupFatalError } from '../../src/types/errors.js';
import { FakeTransport, makeMessages } from '../helpers/fake-transport.js';

const CWD = path.resolve('/srv/mail');

describe('loadConfig', () => {
  it('applies defaults for an empty environment', () => {
    expect(loadConfig({}, CWD)).toEqual({
      hostsFile: path.join(CWD, 'hosts.properties'),
      port: undefined,
      connTimeout: DEFAULT_CONN_TIMEOUT,
      commandTimeout: DEFAULT_COMMAND_TIMEOUT,
      logLevel: 'info',
    });
  });

  it('reads every variable', () => {
    const config = loadConfig({
      POP3_HOSTS_FILE: 'conf/hosts.json',
      POP3_PORT: '1110',
      POP3_CONN_TIMEOUT: '5000',
      POP3_COMMAND_TIMEOUT: '0',
      POP3_LOG_LEVEL: 'debug',
    }, CWD);

    expect(config).toEqual({
      hostsFile: path.join(CWD, 'conf', 'hosts.json'),
      port: 1110,
      connTimeout: 5000,
      commandTimeout: 0,
      logLevel: 'debug',
    });
  });

  it('keeps an absolute hosts file as given', () => {
    const file = path.resolve('/etc/pop3/hosts.properties');
    expect(loadConfig({ POP3_HOSTS_FILE: file }, CWD).hostsFile).toBe(file);
  });

  it('treats empty strings as unset', () => {
    expect(loadConfig({ POP3_PORT: '', POP3_LOG_LEVEL: '' }, CWD)).toMatchObject({
      port: undefined,
      logLevel: 'info',
    });
  });

  it('rejects an out-of-range port', () => {
    expect(() => loadConfig({ POP3_PORT: '70000' }, CWD)).toThrow(StartupFatalError);
    expect(() => loadConfig({ POP3_PORT: '70000' }, CWD)).toThrow(/^Invalid configuration: POP3_PORT: /);
  });

  it('rejects an unknown log level', () => {
    expect(() => loadConfig({ POP3_LOG_LEVEL: 'loud' }, CWD)).toThrow(StartupFatalError);
  });

  it('rejects a timeout that is not a number', () => {
    expect(() => loadConfig({ POP3_CONN_TIMEOUT: 'soon' }, CWD)).toThrow(/POP3_CONN_TIMEOUT/);
  });
});

describe('createConsoleLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('tags lines with the prefix', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    createConsoleLogger('POP3').info('Connected');

    expect(log).toHaveBeenCalledWith('[POP3]', 'Connected');
  });

  it('drops lines below the level', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    const logger = createConsoleLogger('POP3', 'warn');
    logger.debug('hidden');
    logger.warn('shown');

    expect(debug).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith('[POP3]', 'shown');
  });
});

describe('createSessionContext', () => {
  let dir: string;

  beforeAll(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'context-'));
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('loads the host file named in the environment', async () => {
    await writeFile(path.join(dir, 'hosts.properties'), 'example.com=pop.example.com\n');

    const context = await createSessionContext({
      env: { POP3_HOSTS_FILE: path.join(dir, 'hosts.properties'), POP3_LOG_LEVEL: 'silent' },
      transport: new FakeTransport(),
    });

    expect(context.directory.resolve('example.com')).toBe('pop.example.com');
    expect(context.session.state).toBe('signedOut');
  });

  it('fails before building a session when the host file is missing', async () => {
    await expect(createSessionContext({
      env: { POP3_HOSTS_FILE: path.join(dir, 'absent.properties'), POP3_LOG_LEVEL: 'silent' },
    })).rejects.toBeInstanceOf(StartupFatalError);
  });

  it('passes the configured port to every connect', async () => {
    const transport = new FakeTransport(makeMessages(1));
    const context = await createSessionContext({
      env: { POP3_PORT: '1110', POP3_LOG_LEVEL: 'silent' },
      directory: HostDirectory.fromEntries({ 'example.com': 'pop.example.com' }),
      transport,
    });

    await context.session.signIn('alice@example.com', 'secret1');

    expect(transport.calls[0]).toBe('connect pop.example.com:1110');
  });

  it('keeps contexts independent', async () => {
    const directory = HostDirectory.fromEntries({ 'example.com': 'pop.example.com' });
    const first = await createSessionContext({ env: { POP3_LOG_LEVEL: 'silent' }, directory, transport: new FakeTransport() });
    const second = await createSessionContext({ env: { POP3_LOG_LEVEL: 'silent' }, directory, transport: new FakeTransport() });

    await first.session.signIn('alice@example.com', 'secret1');

    expect(first.session.state).toBe('signedIn');
    expect(second.session.state).toBe('signedOut');
  });
});
