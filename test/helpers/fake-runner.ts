import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import type { ToolInvocation, ToolResult, ToolRunner } from '../../src/shared/exec.js';

export type Handler = (invocation: ToolInvocation) => ToolResult | Promise<ToolResult>;

// Smallest well-formed DER SEQUENCE: { INTEGER 5 }.
export const PINNED_DER = Buffer.from([0x30, 0x03, 0x02, 0x01, 0x05]);
// { INTEGER 7, INTEGER 9 }
export const INTERCEPTION_DER = Buffer.from([0x30, 0x06, 0x02, 0x01, 0x07, 0x02, 0x01, 0x09]);

export function ok(stdout = ''): ToolResult {
  return { stdout, stderr: '', exitCode: 0 };
}

export function failed(exitCode: number, stderr = ''): ToolResult {
  return { stdout: '', stderr, exitCode };
}

export function pemFromDer(der: Buffer): string {
  const body = der.toString('base64').replace(/(.{64})/g, '$1\n').trimEnd();
  return `-----BEGIN CERTIFICATE-----\n${body}\n-----END CERTIFICATE-----\n`;
}

/**
 * Records every invocation and answers from per-command handlers. Unknown
 * commands behave like a shell that cannot find them.
 */
export class FakeToolRunner implements ToolRunner {
  readonly calls: ToolInvocation[] = [];
  private readonly handlers = new Map<string, Handler>();

  on(command: string, handler: Handler): this {
    this.handlers.set(command, handler);
    return this;
  }

  async run(invocation: ToolInvocation): Promise<ToolResult> {
    this.calls.push(invocation);
    const handler = this.handlers.get(invocation.command);
    if (!handler) return failed(127, `${invocation.command}: command not found`);
    return handler(invocation);
  }

  callsTo(command: string): ToolInvocation[] {
    return this.calls.filter(c => c.command === command);
  }

  // "<command> <args...>" for every call, in order.
  commandLines(): string[] {
    return this.calls.map(c => [c.command, ...c.args].join(' '));
  }
}

function argAfter(args: readonly string[], flag: string): string {
  const index = args.indexOf(flag);
  const value = index >= 0 ? args[index + 1] : undefined;
  if (value === undefined) throw new Error(`missing ${flag} in ${args.join(' ')}`);
  return value;
}

/** Behaves like `openssl x509 -inform X -outform Y -in A -out B` for the structures the tests use. */
export const fakeOpenssl: Handler = async ({ args }) => {
  const inform = argAfter(args, '-inform');
  const outform = argAfter(args, '-outform');
  const input = await fs.readFile(argAfter(args, '-in'));

  let der: Buffer;
  if (inform === 'PEM') {
    const match = /-----BEGIN CERTIFICATE-----([\s\S]*?)-----END CERTIFICATE-----/.exec(input.toString('latin1'));
    if (!match) return failed(1, 'Could not read certificate from <stdin>\nno start line');
    der = Buffer.from(match[1].replace(/\s+/g, ''), 'base64');
  } else {
    if (input[0] !== 0x30) return failed(1, 'Could not read certificate from <stdin>\nasn1 encoding routines:wrong tag');
    der = input;
  }

  await fs.writeFile(argAfter(args, '-out'), outform === 'PEM' ? pemFromDer(der) : der);
  return ok();
};

/**
 * git against an in-memory "committed" snapshot keyed by absolute path.
 * Supports checkout, ls-files --error-unmatch and status --porcelain.
 */
export function fakeGit(committed: Map<string, Buffer>): Handler {
  return async ({ args, cwd }) => {
    const dir = cwd ?? process.cwd();
    const file = args[args.length - 1];
    const absolute = path.join(dir, file);
    const original = committed.get(absolute);
    const unmatched = failed(1, `error: pathspec '${file}' did not match any file(s) known to git`);

    switch (args[0]) {
      case 'checkout':
        if (!original) return unmatched;
        await fs.writeFile(absolute, original);
        return ok();
      case 'ls-files':
        return original ? ok(`${file}\n`) : unmatched;
      case 'status': {
        if (!original) return ok(`?? ${file}\n`);
        const current = await fs.readFile(absolute);
        return ok(current.equals(original) ? '' : ` M ${file}\n`);
      }
      default:
        return failed(1, `git: '${args[0]}' is not a git command`);
    }
  };
}

export function fakeWhich(available: readonly string[]): Handler {
  return ({ args }) => (available.includes(args[0]) ? ok(`/usr/bin/${args[0]}\n`) : failed(1));
}

export async function makeTempDir(prefix = 'pinswap-test-'): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}
