import type { NodeJson, WireEvent, WireResource } from './wire.js';

export function formatNdjsonLine(event: unknown): string {
  return JSON.stringify(event) + '\n';
}

export function formatNode(node: NodeJson): string {
  return `${node.collection}#${node.token_id}`;
}

export function describeResource(resource: WireResource): string {
  switch (resource.kind) {
    case 'non_fungible':
      return formatNode(resource.node);
    case 'fungible':
      return `${resource.amount} of ${resource.currency}`;
    case 'counted':
      return `${resource.amount} of ${resource.asset.collection}#${resource.asset.asset_id}`;
  }
}

export function formatHumanReadable(event: WireEvent): string {
  const what = describeResource(event.resource);
  switch (event.action) {
    case 'link':
      return `Linked ${what} to ${formatNode(event.target)}`;
    case 'update_target':
      return `Moved ${what} from ${formatNode(event.previous_target)} to ${formatNode(event.target)}`;
    case 'unlink': {
      const from = event.previous_target ? ` from ${formatNode(event.previous_target)}` : '';
      return `Unlinked ${what}${from}, sent to ${event.recipient}`;
    }
  }
}
