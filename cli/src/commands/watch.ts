import { connect, type GlobalOptions } from '../args.js';
import { listenForEvents } from '../wsListener.js';
import { formatHumanReadable, formatNdjsonLine } from '../eventStream.js';
import { EventSchema } from '../wire.js';

export interface WatchOptions {
  count?: number;
}

/** Stream notifications to stdout: NDJSON under --json, one readable line each otherwise. */
export async function runWatch(options: WatchOptions, globals: GlobalOptions): Promise<number> {
  const client = connect(globals);
  let seen = 0;

  await listenForEvents(client.eventsUrl, (raw, stop) => {
    if (globals.json) {
      process.stdout.write(formatNdjsonLine(raw));
    } else {
      const event = EventSchema.safeParse(raw);
      process.stdout.write((event.success ? formatHumanReadable(event.data) : JSON.stringify(raw)) + '\n');
    }
    seen++;
    if (options.count !== undefined && seen >= options.count) stop();
  });

  return seen;
}
