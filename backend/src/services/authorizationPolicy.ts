/** Authorization policies consulted by the composition service before any custody movement. */

import type { NodeRef } from '../models/node.js';
import type { ResourceFamily } from '../models/events.js';
import type { LinkGraph } from './linkGraph.js';
import type { NodeRegistry } from './nodeRegistry.js';

export type ComposeAction = 'link' | 'update_target' | 'unlink';

export interface AuthorizationRequest {
  actor: string;
  family: ResourceFamily;
  action: ComposeAction;
  /**
   * The node whose position or holdings change: the payload node for non-fungible
   * operations, the `from` node for fungible and counted moves, absent for
   * fungible and counted links (which are funded from the actor's own holdings).
   */
  subject?: NodeRef;
  target?: NodeRef;
}

export interface AuthorizationPolicy {
  authorize(request: AuthorizationRequest): Promise<boolean>;
}

export const allowAllPolicy: AuthorizationPolicy = {
  authorize: async () => true,
};

/** The actor must hold the root of the subject's tree. */
export class RootOwnerPolicy implements AuthorizationPolicy {
  constructor(
    private graph: LinkGraph,
    private registry: NodeRegistry,
  ) {}

  async authorize(request: AuthorizationRequest): Promise<boolean> {
    if (!request.subject) return true;
    const root = this.graph.findRoot(request.subject);
    const owner = await this.registry.ownerOf(root);
    return owner !== null && owner === request.actor.toLowerCase();
  }
}
