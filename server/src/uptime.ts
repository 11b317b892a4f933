#!/usr/bin/env node
import 'dotenv/config';
import { resolveLogRoot } from './config/MonitorConfig';
import { UptimeReporter, createPrompt, runUptimeCli } from './services/uptime';

async function main(): Promise<void> {
  const reporter = new UptimeReporter(resolveLogRoot());
  const code = await runUptimeCli(process.argv.slice(2), reporter, {
    out: text => console.log(text),
    err: text => console.error(text),
    prompt: createPrompt(process.stdin, process.stdout),
  });
  process.exit(code);
}

main().catch(err => {
  console.error('Error:', err);
  process.exit(1);
});
