import type { GlobalOptions } from './args.js';

/** Write the raw JSON under --json, the human line otherwise. */
export function print(globals: GlobalOptions, json: unknown, human: string): void {
  if (globals.json) {
    process.stdout.write(JSON.stringify(json, null, 2) + '\n');
  } else {
    process.stdout.write(human + '\n');
  }
}
