import { ProxyProcessLauncher, buildProxyArgs } from '../../../src/proxy/launcher.js';
import { ToolInvocationError } from '../../../src/shared/errors.js';
import { FakeToolRunner, failed, ok } from '../../helpers/fake-runner.js';

const SETTINGS = {
  headlessCommand: 'mitmproxy',
  webCommand: 'mitmweb',
  listenHost: '127.0.0.1',
  listenPort: 8080,
};

describe('buildProxyArgs', () => {
  it('passes listen address, scripts in order, and upstream trust', () => {
    expect(buildProxyArgs(['a.py', 'dir/b.py'], '/tmp/s/upstream-ca.pem', SETTINGS)).toEqual([
      '--listen-host',
      '127.0.0.1',
      '--listen-port',
      '8080',
      '--scripts',
      'a.py',
      '--scripts',
      'dir/b.py',
      '--set',
      'ssl_verify_upstream_trusted_ca=/tmp/s/upstream-ca.pem',
    ]);
  });

  it('omits --scripts when there are none', () => {
    expect(buildProxyArgs([], '/tmp/u.pem', SETTINGS)).not.toContain('--scripts');
  });
});

describe('ProxyProcessLauncher', () => {
  it('runs the console UI interactively in headless mode', async () => {
    const runner = new FakeToolRunner().on('mitmproxy', () => ok());
    const status = await new ProxyProcessLauncher(runner, SETTINGS).run('headless', [], '/tmp/u.pem');
    expect(status).toEqual({ exitCode: 0, signal: null, userTerminated: false });
    expect(runner.calls[0].interactive).toBe(true);
  });

  it('runs the web UI in web mode', async () => {
    const runner = new FakeToolRunner().on('mitmweb', () => ok());
    await new ProxyProcessLauncher(runner, SETTINGS).run('web', ['x.py'], '/tmp/u.pem');
    expect(runner.callsTo('mitmweb')).toHaveLength(1);
    expect(runner.callsTo('mitmproxy')).toHaveLength(0);
  });

  it('treats an operator interrupt as a normal end', async () => {
    const runner = new FakeToolRunner().on('mitmproxy', () => failed(130));
    const status = await new ProxyProcessLauncher(runner, SETTINGS).run('headless', [], '/tmp/u.pem');
    expect(status).toEqual({ exitCode: 130, signal: null, userTerminated: true });
  });

  it('reports a signal exit as user-terminated', async () => {
    const runner = new FakeToolRunner().on('mitmproxy', () => ({ stdout: '', stderr: '', exitCode: null, signal: 'SIGTERM' }));
    const status = await new ProxyProcessLauncher(runner, SETTINGS).run('headless', [], '/tmp/u.pem');
    expect(status).toEqual({ exitCode: null, signal: 'SIGTERM', userTerminated: true });
  });

  it('resolves with a non-zero exit that the operator did not cause', async () => {
    const runner = new FakeToolRunner().on('mitmproxy', () => failed(1, 'address already in use'));
    const status = await new ProxyProcessLauncher(runner, SETTINGS).run('headless', [], '/tmp/u.pem');
    expect(status).toEqual({ exitCode: 1, signal: null, userTerminated: false });
  });

  it('rejects when the proxy cannot be started', async () => {
    const runner = new FakeToolRunner().on('mitmproxy', () => {
      throw new ToolInvocationError('mitmproxy could not be started: spawn mitmproxy ENOENT', {
        command: 'mitmproxy',
        args: [],
        exitCode: null,
      });
    });
    await expect(new ProxyProcessLauncher(runner, SETTINGS).run('headless', [], '/tmp/u.pem')).rejects.toBeInstanceOf(
      ToolInvocationError
    );
  });
});
