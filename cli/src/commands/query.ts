import { connect, type GlobalOptions } from '../args.js';
import { formatNode } from '../eventStream.js';
import { print } from '../output.js';
import type { AssetJson, NodeJson } from '../wire.js';

export interface BalanceOptions {
  currency?: string;
  asset?: AssetJson;
}

export async function runRoot(node: NodeJson, globals: GlobalOptions): Promise<void> {
  const root = await connect(globals).root(node);
  print(globals, { root }, formatNode(root));
}

export async function runTarget(node: NodeJson, globals: GlobalOptions): Promise<void> {
  const target = await connect(globals).target(node);
  print(globals, { target }, target ? formatNode(target) : '(no target)');
}

export async function runChildren(node: NodeJson, globals: GlobalOptions): Promise<void> {
  const children = await connect(globals).children(node);
  print(globals, { children }, children.length ? children.map(formatNode).join('\n') : '(no children)');
}

export async function runOwner(node: NodeJson, globals: GlobalOptions): Promise<void> {
  const result = await connect(globals).owner(node);
  print(globals, result, `${result.owner ?? '(unowned)'} via root ${formatNode(result.root)}`);
}

export async function runBalance(node: NodeJson, options: BalanceOptions, globals: GlobalOptions): Promise<void> {
  const client = connect(globals);
  if (options.currency && !options.asset) {
    const amount = await client.fungibleBalance(node, options.currency);
    print(globals, { currency: options.currency, amount }, amount);
    return;
  }
  if (options.asset && !options.currency) {
    const amount = await client.countedBalance(node, options.asset);
    print(globals, { asset: options.asset, amount }, amount);
    return;
  }
  throw new Error('Pass exactly one of --currency or --asset');
}
