import type { EventHandler } from '../common/props';
import type { ComponentNode } from '../tree/node';

/**
 * Presentation collaborator. The runtime never builds UI primitives itself;
 * it hands Component Nodes and marker handlers to a Renderer.
 */
export interface Renderer {
  /**
   * Create or patch the presentation for `node`. Without a path, `node` is
   * the whole tree; with one, it replaces (or appends) the node at that key
   * path.
   */
  createOrUpdate(node: ComponentNode, path?: readonly string[]): void;

  /** Attach live handlers (event name → handler) to an existing marker */
  bindMarker(
    markerId: string,
    handlers: Readonly<Record<string, EventHandler>>
  ): void;

  /** Remove the presentation at a key path */
  remove?(path: readonly string[]): void;

  /** Record existing presentation (server markup) as matching `tree` */
  adopt?(tree: ComponentNode): void;

  hasMarker?(markerId: string): boolean;
}
