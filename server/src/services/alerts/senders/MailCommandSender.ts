import { spawn } from 'node:child_process';
import type { Readable, Writable } from 'node:stream';
import { INotifier, Notification, SendResult } from '../types';
import { buildMessage } from '../message';

const MAIL_TIMEOUT_MS = 30_000;

/**
 * The parts of a child process the sender touches.
 */
export interface MailProcess {
  stdin: Writable | null;
  stderr: Readable | null;
  once(event: 'error', listener: (err: Error) => void): this;
  once(event: 'close', listener: (code: number | null) => void): this;
  kill(): boolean;
}

export type SpawnMail = (command: string, args: string[]) => MailProcess;

const defaultSpawn: SpawnMail = (command, args) =>
  spawn(command, args, { stdio: ['pipe', 'ignore', 'pipe'] });

/**
 * Hands the message to a local `mail`-compatible program:
 *
 *   echo "<body>" | mail -s "<subject>" <recipient>...
 */
export class MailCommandSender implements INotifier {
  readonly channel = 'mail';
  private readonly command: string;
  private readonly spawnMail: SpawnMail;
  private readonly timeoutMs: number;

  constructor(command = 'mail', spawnMail: SpawnMail = defaultSpawn, timeoutMs = MAIL_TIMEOUT_MS) {
    this.command = command;
    this.spawnMail = spawnMail;
    this.timeoutMs = timeoutMs;
  }

  send(notification: Notification, recipients: readonly string[], signal?: AbortSignal): Promise<SendResult> {
    if (recipients.length === 0) {
      return Promise.resolve({ success: false, error: 'No mail recipients configured' });
    }
    if (signal?.aborted) {
      return Promise.resolve({ success: false, error: `${this.command} cancelled` });
    }

    const { subject, body } = buildMessage(notification);

    return new Promise<SendResult>((resolve) => {
      let settled = false;
      let stderr = '';
      const finish = (result: SendResult): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
        resolve(result);
      };

      let child: MailProcess;
      try {
        child = this.spawnMail(this.command, ['-s', subject, ...recipients]);
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        resolve({ success: false, error: `Failed to start ${this.command}: ${message}` });
        return;
      }

      const timer = setTimeout(() => {
        child.kill();
        finish({ success: false, error: `${this.command} timed out after ${this.timeoutMs}ms` });
      }, this.timeoutMs);
      timer.unref();

      const onAbort = (): void => {
        child.kill();
        finish({ success: false, error: `${this.command} cancelled` });
      };
      signal?.addEventListener('abort', onAbort, { once: true });

      child.stderr?.on('data', (chunk: Buffer | string) => {
        stderr += chunk.toString();
      });

      child.once('error', (err) => {
        finish({ success: false, error: `Failed to start ${this.command}: ${err.message}` });
      });

      child.once('close', (code) => {
        if (code === 0) {
          finish({ success: true });
        } else {
          const detail = stderr.trim() ? `: ${stderr.trim()}` : '';
          finish({ success: false, error: `${this.command} exited with code ${code}${detail}` });
        }
      });

      child.stdin?.on('error', (err) => {
        finish({ success: false, error: `Failed to write to ${this.command}: ${err.message}` });
      });
      child.stdin?.end(`${body}\n`);
    });
  }
}
