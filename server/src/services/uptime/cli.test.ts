import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { PassThrough } from 'node:stream';
import { createPrompt, runUptimeCli, CliIO } from './cli';
import { UptimeReporter } from './UptimeReporter';

function recordingIO(answer = ''): CliIO & { stdout: string[]; stderr: string[]; prompt: jest.Mock } {
  const stdout: string[] = [];
  const stderr: string[] = [];
  return {
    stdout,
    stderr,
    out: text => stdout.push(text),
    err: text => stderr.push(text),
    prompt: jest.fn(async () => answer),
  };
}

describe('runUptimeCli', () => {
  let tmpDir: string;
  let reporter: UptimeReporter;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'uptime-cli-'));
    reporter = new UptimeReporter(tmpDir, { warn: jest.fn() });
    const dir = path.join(tmpDir, 'shop', '2026', '04');
    fs.mkdirSync(dir, { recursive: true });
    fs.writeFileSync(
      path.join(dir, '2026-04-02.log'),
      '[OK] 2026-04-02 10:00:00 - https://shop.example.com/ is up and running\n',
    );
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('should print a report for the named monitor', async () => {
    const io = recordingIO();

    await expect(runUptimeCli(['shop'], reporter, io)).resolves.toBe(0);

    expect(io.stdout).toHaveLength(1);
    expect(io.stdout[0]).toContain('  Uptime Percentage:   100.0000%');
    expect(io.stdout[0]).toContain('Status: EXCELLENT - Four nines availability (99.99%+)');
    expect(io.prompt).not.toHaveBeenCalled();
  });

  it('should list monitors for --help', async () => {
    fs.mkdirSync(path.join(tmpDir, 'api'));
    const io = recordingIO();

    await expect(runUptimeCli(['--help'], reporter, io)).resolves.toBe(0);

    expect(io.stdout[0].split('\n').slice(-3)).toEqual(['Available monitors:', '  - api', '  - shop']);
  });

  it('should prompt when no name is given', async () => {
    const io = recordingIO('shop\n');

    await expect(runUptimeCli([], reporter, io)).resolves.toBe(0);

    expect(io.prompt).toHaveBeenCalledWith('Enter monitor name: ');
    expect(io.stdout[0]).toContain('  - shop');
    expect(io.stdout[1]).toContain('   Uptime Report: shop');
  });

  it('should fail on an empty answer', async () => {
    const io = recordingIO('');

    await expect(runUptimeCli([], reporter, io)).resolves.toBe(1);

    expect(io.stderr).toEqual(['ERROR: Monitor name cannot be empty']);
  });

  it('should fail on an unsafe name', async () => {
    const io = recordingIO();

    await expect(runUptimeCli(['shop;rm'], reporter, io)).resolves.toBe(1);

    expect(io.stderr).toEqual(['ERROR: Invalid monitor name. Use only letters, numbers, underscores, and hyphens']);
  });

  it('should fail for an unknown monitor', async () => {
    const io = recordingIO();

    await expect(runUptimeCli(['ghost'], reporter, io)).resolves.toBe(1);

    expect(io.stderr[0]).toBe(`ERROR: Logs for monitor 'ghost' not found: directory ${path.join(tmpDir, 'ghost')}`);
  });

  it('should exit 0 when there is no check data', async () => {
    fs.mkdirSync(path.join(tmpDir, 'idle'));
    const io = recordingIO();

    await expect(runUptimeCli(['idle'], reporter, io)).resolves.toBe(0);

    expect(io.stdout[0]).toContain("No check data found for monitor 'idle'.");
  });

  it('should fail when input closes before a name is entered', async () => {
    const input = new PassThrough();
    input.end();
    const stderr: string[] = [];
    const io: CliIO = {
      out: () => undefined,
      err: text => stderr.push(text),
      prompt: createPrompt(input, new PassThrough()),
    };

    await expect(runUptimeCli([], reporter, io)).resolves.toBe(1);

    expect(stderr).toEqual(['ERROR: Monitor name cannot be empty']);
  });
});

describe('createPrompt', () => {
  it('should resolve the entered line', async () => {
    const input = new PassThrough();
    const prompt = createPrompt(input, new PassThrough());

    const answer = prompt('Enter monitor name: ');
    input.end('shop\n');

    await expect(answer).resolves.toBe('shop');
  });

  it('should resolve empty when input ends without a line', async () => {
    const input = new PassThrough();
    input.end();

    await expect(createPrompt(input, new PassThrough())('Enter monitor name: ')).resolves.toBe('');
  });
});
