import { connect, type GlobalOptions } from '../args.js';
import type { Family } from '../client.js';
import { formatHumanReadable } from '../eventStream.js';
import { print } from '../output.js';
import type { AssetJson, NodeJson, WireEvent } from '../wire.js';

export interface ComposeOptions {
  actor: string;
  annotation?: string;
}

export interface LeafOptions {
  currency?: string;
  asset?: AssetJson;
}

export interface UpdateTargetOptions extends ComposeOptions, LeafOptions {}

export interface UnlinkOptions extends ComposeOptions {
  recipient: string;
}

export interface DepositOptions extends ComposeOptions, LeafOptions {
  amount: string;
}

export interface WithdrawOptions extends UnlinkOptions, LeafOptions {
  amount?: string;
}

type Leaf = { family: 'fungible'; key: { currency: string } } | { family: 'counted'; key: { asset: AssetJson } };

/** Pick the attachment family from --currency / --asset. Null when neither is given. */
export function leafOf(options: LeafOptions): Leaf | null {
  if (options.currency && options.asset) {
    throw new Error('Pass only one of --currency or --asset');
  }
  if (options.currency) return { family: 'fungible', key: { currency: options.currency } };
  if (options.asset) return { family: 'counted', key: { asset: options.asset } };
  return null;
}

function requireLeaf(options: LeafOptions): Leaf {
  const leaf = leafOf(options);
  if (!leaf) throw new Error('Pass one of --currency or --asset');
  return leaf;
}

function base(options: ComposeOptions): Record<string, unknown> {
  return options.annotation ? { actor: options.actor, annotation: options.annotation } : { actor: options.actor };
}

function report(globals: GlobalOptions, event: WireEvent): void {
  print(globals, event, formatHumanReadable(event));
}

export async function runLink(
  node: NodeJson,
  target: NodeJson,
  options: ComposeOptions,
  globals: GlobalOptions,
): Promise<void> {
  const event = await connect(globals).compose('non-fungible', 'link', { ...base(options), payload: node, target });
  report(globals, event);
}

/** Re-parent a node, or move an attachment's whole balance when --currency / --asset is given. */
export async function runUpdateTarget(
  node: NodeJson,
  target: NodeJson,
  options: UpdateTargetOptions,
  globals: GlobalOptions,
): Promise<void> {
  const leaf = leafOf(options);
  const family: Family = leaf ? leaf.family : 'non-fungible';
  const payload = leaf ? { ...leaf.key, from: node } : node;
  const event = await connect(globals).compose(family, 'update-target', {
    ...base(options),
    payload,
    new_target: target,
  });
  report(globals, event);
}

export async function runUnlink(node: NodeJson, options: UnlinkOptions, globals: GlobalOptions): Promise<void> {
  const event = await connect(globals).compose('non-fungible', 'unlink', {
    ...base(options),
    payload: node,
    recipient: options.recipient,
  });
  report(globals, event);
}

export async function runDeposit(node: NodeJson, options: DepositOptions, globals: GlobalOptions): Promise<void> {
  const leaf = requireLeaf(options);
  const event = await connect(globals).compose(leaf.family, 'link', {
    ...base(options),
    payload: { ...leaf.key, amount: options.amount },
    target: node,
  });
  report(globals, event);
}

export async function runWithdraw(node: NodeJson, options: WithdrawOptions, globals: GlobalOptions): Promise<void> {
  const leaf = requireLeaf(options);
  const amount = options.amount ? { amount: options.amount } : {};
  const event = await connect(globals).compose(leaf.family, 'unlink', {
    ...base(options),
    payload: { ...leaf.key, from: node, ...amount },
    recipient: options.recipient,
  });
  report(globals, event);
}
