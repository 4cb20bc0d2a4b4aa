/**
 * Tree compatibility and adoption planning
 *
 * Compares the server tree carried by a hydration context with a freshly
 * computed client snapshot.
 *
 * - `deep`: a node is compatible when type and key match (and, for text
 *   nodes, the text); children are matched by position and checked
 *   recursively. Props are not compared: attribute drift is patched on the
 *   next commit, not treated as a structural mismatch.
 * - `shallow`: only the root types are compared; everything below the root
 *   is adopted as-is.
 *
 * A mismatched subtree never fails the whole root: it becomes a fresh-render
 * entry while its matching siblings stay adopted.
 */

import type { HydrationPolicy } from '../common/config';
import { TreeIncompatibleError } from '../common/errors';
import {
  isTextNode,
  joinPath,
  splitPath,
  nodeAtPath,
  textOf,
  type ComponentNode,
} from '../tree/node';
import type { MarkerBinding, TreeSnapshot } from '../tree/snapshot';
import type { HydrationContext } from './wire';

export interface FreshEntry {
  /** `replace` targets an existing server node; `append` adds after the last server child */
  readonly mode: 'replace' | 'append';
  /** Key path of the target in the server presentation */
  readonly path: readonly string[];
  /** Key path of `node` in the client tree */
  readonly clientPath: readonly string[];
  readonly node: ComponentNode;
  readonly error: TreeIncompatibleError;
}

export interface AdoptionPlan {
  /** Server nodes kept as-is */
  readonly adoptedNodes: number;
  /**
   * Structural mismatches in document order (replacements before appends
   * within a parent), then unmarked interactive subtrees in document order
   */
  readonly fresh: readonly FreshEntry[];
  /** Server subtrees with no client counterpart, in document order */
  readonly removals: readonly (readonly string[])[];
  /** Client bindings, in document order */
  readonly bindings: readonly MarkerBinding[];
  readonly fullMatch: boolean;
}

function describe(node: ComponentNode): string {
  return isTextNode(node) ? `#text(${JSON.stringify(textOf(node))})` : node.type;
}

/**
 * First incompatibility between a server node and a client node, without
 * looking at children.
 */
function nodeMismatch(
  server: ComponentNode,
  client: ComponentNode,
  path: readonly string[]
): TreeIncompatibleError | null {
  const at = joinPath(path);
  if (server.type !== client.type) {
    return new TreeIncompatibleError(at, 'type', server.type, client.type);
  }
  if (server.key !== client.key) {
    return new TreeIncompatibleError(
      at,
      'key',
      `${server.type}[key=${server.key}]`,
      `${client.type}[key=${client.key}]`
    );
  }
  if (isTextNode(server) && textOf(server) !== textOf(client)) {
    return new TreeIncompatibleError(at, 'text', describe(server), describe(client));
  }
  return null;
}

/**
 * First mismatch in document order, or null when the trees are compatible
 * under `policy`.
 */
export function findIncompatibility(
  server: ComponentNode,
  client: ComponentNode | null,
  policy: HydrationPolicy = 'deep'
): TreeIncompatibleError | null {
  if (!client) {
    return new TreeIncompatibleError(
      joinPath([server.key]),
      'type',
      server.type,
      '(nothing)'
    );
  }
  if (policy === 'shallow') {
    return server.type === client.type
      ? null
      : new TreeIncompatibleError(
          joinPath([server.key]),
          'type',
          server.type,
          client.type
        );
  }
  return deepMismatch(server, client, [server.key]);
}

function deepMismatch(
  server: ComponentNode,
  client: ComponentNode,
  path: readonly string[]
): TreeIncompatibleError | null {
  const own = nodeMismatch(server, client, path);
  if (own) return own;

  const shared = Math.min(server.children.length, client.children.length);
  for (let i = 0; i < shared; i++) {
    const s = server.children[i];
    const found = deepMismatch(s, client.children[i], [...path, s.key]);
    if (found) return found;
  }
  if (client.children.length > shared) {
    const extra = client.children[shared];
    return new TreeIncompatibleError(
      joinPath([...path, extra.key]),
      'missing-on-server',
      null,
      describe(extra)
    );
  }
  if (server.children.length > shared) {
    const extra = server.children[shared];
    return new TreeIncompatibleError(
      joinPath([...path, extra.key]),
      'missing-on-client',
      describe(extra),
      '(nothing)'
    );
  }
  return null;
}

export function validateTreeCompatibility(
  serverContext: HydrationContext,
  clientTree: ComponentNode | null,
  policy: HydrationPolicy = 'deep'
): boolean {
  return (
    findIncompatibility(serverContext.componentTree, clientTree, policy) ===
    null
  );
}

function isUnder(path: readonly string[], prefix: readonly string[]): boolean {
  if (path.length < prefix.length) return false;
  return prefix.every((segment, i) => path[i] === segment);
}

function rootMismatch(
  server: ComponentNode,
  client: ComponentNode,
  policy: HydrationPolicy
): TreeIncompatibleError | null {
  const path = [server.key];
  if (policy === 'shallow') {
    return server.type === client.type
      ? null
      : new TreeIncompatibleError(joinPath(path), 'type', server.type, client.type);
  }
  return nodeMismatch(server, client, path);
}

/** Server nodes outside every excluded subtree */
function countAdopted(
  node: ComponentNode,
  path: readonly string[],
  excluded: readonly (readonly string[])[]
): number {
  if (excluded.some((prefix) => isUnder(path, prefix))) return 0;
  let total = 1;
  for (const child of node.children) {
    total += countAdopted(child, [...path, child.key], excluded);
  }
  return total;
}

/**
 * Decide, node by node, what can be adopted from the server presentation
 * and what the client must render fresh.
 */
export function planAdoption(
  serverContext: HydrationContext,
  client: TreeSnapshot,
  policy: HydrationPolicy = 'deep'
): AdoptionPlan {
  const server = serverContext.componentTree;
  const bindings = Array.from(client.bindings.values());
  const clientTree = client.tree;
  const rootPath = [server.key];

  if (!clientTree) {
    return { adoptedNodes: 0, fresh: [], removals: [rootPath], bindings, fullMatch: false };
  }

  const atRoot = rootMismatch(server, clientTree, policy);
  if (atRoot) {
    return {
      adoptedNodes: 0,
      fresh: [
        {
          mode: 'replace',
          path: rootPath,
          clientPath: [clientTree.key],
          node: clientTree,
          error: atRoot,
        },
      ],
      removals: [],
      bindings,
      fullMatch: false,
    };
  }

  const fresh: FreshEntry[] = [];
  const removals: (readonly string[])[] = [];

  const walk = (
    s: ComponentNode,
    c: ComponentNode,
    path: readonly string[]
  ): void => {
    const mismatch = nodeMismatch(s, c, path);
    if (mismatch) {
      fresh.push({
        mode: 'replace',
        path,
        clientPath: [...path.slice(0, -1), c.key],
        node: c,
        error: mismatch,
      });
      return;
    }

    const shared = Math.min(s.children.length, c.children.length);
    for (let i = 0; i < shared; i++) {
      walk(s.children[i], c.children[i], [...path, s.children[i].key]);
    }
    for (let i = shared; i < s.children.length; i++) {
      removals.push([...path, s.children[i].key]);
    }
    for (let i = shared; i < c.children.length; i++) {
      const extra = c.children[i];
      const clientPath = [...path, extra.key];
      fresh.push({
        mode: 'append',
        path: clientPath,
        clientPath,
        node: extra,
        error: new TreeIncompatibleError(
          joinPath(clientPath),
          'missing-on-server',
          null,
          describe(extra)
        ),
      });
    }
  };

  if (policy === 'deep') walk(server, clientTree, rootPath);

  // An interactive node the server did not mark cannot be bound to existing
  // markup; render it fresh.
  const serverMarkers = new Set(
    serverContext.hydrationMarkers.map((m) => m.id)
  );
  for (const binding of bindings) {
    if (serverMarkers.has(binding.markerId)) continue;
    const clientPath = splitPath(binding.markerId);
    if (fresh.some((f) => isUnder(clientPath, f.clientPath))) continue;

    const node = nodeAtPath(clientTree, clientPath);
    if (!node) continue;

    for (let i = fresh.length - 1; i >= 0; i--) {
      if (isUnder(fresh[i].clientPath, clientPath)) fresh.splice(i, 1);
    }
    for (let i = removals.length - 1; i >= 0; i--) {
      if (isUnder(removals[i], clientPath)) removals.splice(i, 1);
    }
    fresh.push({
      mode: 'replace',
      path: clientPath,
      clientPath,
      node,
      error: new TreeIncompatibleError(
        binding.markerId,
        'marker-missing',
        null,
        node.type
      ),
    });
  }

  const excluded = [
    ...fresh.filter((f) => f.mode === 'replace').map((f) => f.path),
    ...removals,
  ];

  return {
    adoptedNodes: countAdopted(server, rootPath, excluded),
    fresh,
    removals,
    bindings,
    fullMatch: fresh.length === 0 && removals.length === 0,
  };
}
