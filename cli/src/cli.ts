#!/usr/bin/env node

import { Command } from 'commander';
import {
  DEFAULT_URL,
  parseAddressArg,
  parseAmountArg,
  parseAssetArg,
  parseCountArg,
  parseHexArg,
  parseNodeArg,
  type GlobalOptions,
} from './args.js';
import { GraphClientError } from './client.js';
import type { AssetJson, NodeJson } from './wire.js';

interface ComposeFlags {
  actor: string;
  annotation?: string;
}

interface LeafFlags {
  currency?: string;
  asset?: AssetJson;
}

/** Wrap a command action so failures land on stderr with exit code 1. */
function guarded<A extends unknown[]>(fn: (...args: A) => Promise<void>): (...args: A) => Promise<void> {
  return async (...args: A) => {
    try {
      await fn(...args);
    } catch (err) {
      if (err instanceof GraphClientError) {
        const kind = err.kind ? ` (${err.kind})` : '';
        process.stderr.write(`Error${kind}: ${err.message}\n`);
        for (const detail of err.errors) process.stderr.write(`  ${detail}\n`);
      } else {
        process.stderr.write(`Error: ${err instanceof Error ? err.message : String(err)}\n`);
      }
      process.exitCode = 1;
    }
  };
}

function globalsOf(command: Command): GlobalOptions {
  return command.optsWithGlobals<GlobalOptions>();
}

function withComposeOptions(command: Command): Command {
  return command
    .requiredOption('--actor <address>', 'Address performing the operation', parseAddressArg)
    .option('--annotation <hex>', 'Opaque 0x-prefixed bytes carried in the notification', parseHexArg);
}

function withLeafOptions(command: Command): Command {
  return command
    .option('--currency <address>', 'Fungible currency contract', parseAddressArg)
    .option('--asset <collection#assetId>', 'Counted asset', parseAssetArg);
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('cgraph')
    .description('Composability graph client: nest tokens, attach balances, resolve roots')
    .version('0.1.0')
    .option('--url <url>', `Server URL (env CGRAPH_URL, default ${DEFAULT_URL})`)
    .option('--token <token>', 'Bearer token (env CGRAPH_TOKEN)')
    .option('--json', 'Print raw JSON');

  program
    .command('serve')
    .description('Run a graph server in the foreground')
    .option('--port <port>', 'Port to listen on (default: first free port from 9100)', parseCountArg)
    .option('--data-dir <dir>', 'Persist graph state under this directory')
    .option('--log-dir <dir>', 'Write the operation log under this directory')
    .action(
      guarded(async (options: { port?: number; dataDir?: string; logDir?: string }, command: Command) => {
        const globals = globalsOf(command);
        const { runServe } = await import('./commands/serve.js');
        await runServe({ ...options, token: globals.token }, globals);
      }),
    );

  // -- Queries --

  program
    .command('root')
    .description('Resolve the root of a node')
    .argument('<node>', '<collection>#<tokenId>', parseNodeArg)
    .action(
      guarded(async (node: NodeJson, _options: object, command: Command) => {
        const { runRoot } = await import('./commands/query.js');
        await runRoot(node, globalsOf(command));
      }),
    );

  program
    .command('target')
    .description('Show the direct target of a node')
    .argument('<node>', '<collection>#<tokenId>', parseNodeArg)
    .action(
      guarded(async (node: NodeJson, _options: object, command: Command) => {
        const { runTarget } = await import('./commands/query.js');
        await runTarget(node, globalsOf(command));
      }),
    );

  program
    .command('children')
    .description('List the nodes linked directly to a node')
    .argument('<node>', '<collection>#<tokenId>', parseNodeArg)
    .action(
      guarded(async (node: NodeJson, _options: object, command: Command) => {
        const { runChildren } = await import('./commands/query.js');
        await runChildren(node, globalsOf(command));
      }),
    );

  program
    .command('owner')
    .description('Show the owner of the root of a node')
    .argument('<node>', '<collection>#<tokenId>', parseNodeArg)
    .action(
      guarded(async (node: NodeJson, _options: object, command: Command) => {
        const { runOwner } = await import('./commands/query.js');
        await runOwner(node, globalsOf(command));
      }),
    );

  withLeafOptions(
    program
      .command('balance')
      .description('Show an attached balance (pass --currency or --asset)')
      .argument('<node>', '<collection>#<tokenId>', parseNodeArg),
  ).action(
    guarded(async (node: NodeJson, options: LeafFlags, command: Command) => {
      const { runBalance } = await import('./commands/query.js');
      await runBalance(node, options, globalsOf(command));
    }),
  );

  // -- Composition --

  withComposeOptions(
    program
      .command('link')
      .description('Attach an unlinked node to a target')
      .argument('<node>', '<collection>#<tokenId>', parseNodeArg)
      .argument('<target>', '<collection>#<tokenId>', parseNodeArg),
  ).action(
    guarded(async (node: NodeJson, target: NodeJson, options: ComposeFlags, command: Command) => {
      const { runLink } = await import('./commands/compose.js');
      await runLink(node, target, options, globalsOf(command));
    }),
  );

  withLeafOptions(
    withComposeOptions(
      program
        .command('update-target')
        .description('Move a linked node, or a whole attached balance with --currency/--asset, to a new target')
        .argument('<node>', 'Node to move, or node holding the balance', parseNodeArg)
        .argument('<target>', 'New target <collection>#<tokenId>', parseNodeArg),
    ),
  ).action(
    guarded(async (node: NodeJson, target: NodeJson, options: ComposeFlags & LeafFlags, command: Command) => {
      const { runUpdateTarget } = await import('./commands/compose.js');
      await runUpdateTarget(node, target, options, globalsOf(command));
    }),
  );

  withComposeOptions(
    program
      .command('unlink')
      .description('Detach a linked node and hand it to a recipient')
      .argument('<node>', '<collection>#<tokenId>', parseNodeArg)
      .requiredOption('--recipient <address>', 'Address receiving the node', parseAddressArg),
  ).action(
    guarded(async (node: NodeJson, options: ComposeFlags & { recipient: string }, command: Command) => {
      const { runUnlink } = await import('./commands/compose.js');
      await runUnlink(node, options, globalsOf(command));
    }),
  );

  withLeafOptions(
    withComposeOptions(
      program
        .command('deposit')
        .description('Attach a currency or counted-asset amount to a node')
        .argument('<node>', '<collection>#<tokenId>', parseNodeArg)
        .requiredOption('--amount <n>', 'Amount to attach', parseAmountArg),
    ),
  ).action(
    guarded(async (node: NodeJson, options: ComposeFlags & LeafFlags & { amount: string }, command: Command) => {
      const { runDeposit } = await import('./commands/compose.js');
      await runDeposit(node, options, globalsOf(command));
    }),
  );

  withLeafOptions(
    withComposeOptions(
      program
        .command('withdraw')
        .description('Detach an attached amount (the whole balance without --amount) to a recipient')
        .argument('<node>', '<collection>#<tokenId>', parseNodeArg)
        .requiredOption('--recipient <address>', 'Address receiving the amount', parseAddressArg)
        .option('--amount <n>', 'Amount to detach', parseAmountArg),
    ),
  ).action(
    guarded(
      async (
        node: NodeJson,
        options: ComposeFlags & LeafFlags & { recipient: string; amount?: string },
        command: Command,
      ) => {
        const { runWithdraw } = await import('./commands/compose.js');
        await runWithdraw(node, options, globalsOf(command));
      },
    ),
  );

  // -- Notifications --

  program
    .command('watch')
    .description('Stream composition notifications (NDJSON with --json)')
    .option('--count <n>', 'Stop after this many notifications', parseCountArg)
    .action(
      guarded(async (options: { count?: number }, command: Command) => {
        const { runWatch } = await import('./commands/watch.js');
        await runWatch(options, globalsOf(command));
      }),
    );

  return program;
}

const isDirectRun = process.argv[1]?.endsWith('cli.js') || process.argv[1]?.endsWith('cli.ts');
if (isDirectRun) {
  createProgram()
    .parseAsync()
    .catch((err: unknown) => {
      process.stderr.write(`Error: ${err instanceof Error ? err.message : String(err)}\n`);
      process.exitCode = 1;
    });
}
