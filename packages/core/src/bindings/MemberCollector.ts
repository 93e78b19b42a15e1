/**
 * MemberCollector - gathers every member reachable from a type's impl blocks
 *
 * Members are keyed by name. One name can carry several entries (an
 * inherent `add` and `Add::add`, or the same method from two traits), so the
 * map holds ordered lists: impl declaration order, then member order.
 */

import type { GraphItem, ImplInner, ItemId, TypeConfig } from '@scriptwrap/types';
import { GraphError } from '../errors/ScriptwrapError.js';
import { idKey, itemKind, pathRefName } from '../graph/items.js';
import type { TypeGraph } from '../graph/TypeGraph.js';

/**
 * One member together with the impl block it was declared in
 */
export interface ImplMember {
  impl: ImplInner;
  member: GraphItem;
}

export interface MemberSet {
  /** The inherent impl; the last one wins when a graph lists several */
  selfImpl: ImplInner | undefined;
  implItems: Map<string, ImplMember[]>;
  implementedTraits: Set<string>;
}

/**
 * A matched type with everything the emitter needs to describe it
 */
export interface WrappedItem extends MemberSet {
  /** Generated proxy type, e.g. "LuaVec3" */
  wrapperName: string;
  /** Type name as configured, e.g. "Vec3" */
  wrappedType: string;
  /** Import-ready path, e.g. ["bevy", "math", "Vec3"] */
  pathComponents: string[];
  graph: TypeGraph;
  config: TypeConfig;
  item: GraphItem;
  /** True iff at least one selected method has no receiver; set by selectMethods */
  hasGlobalMethods: boolean;
}

function implsOf(item: GraphItem): readonly ItemId[] {
  if (item.inner.struct) return item.inner.struct.impls;
  if (item.inner.enum) return item.inner.enum.impls;
  throw new GraphError(
    `Item ${idKey(item.id)} (${item.name ?? 'unnamed'}) is a ${itemKind(item)}, only structs and enums can be wrapped`,
    'ERR_UNEXPECTED_ITEM_KIND',
    { itemId: idKey(item.id) }
  );
}

/**
 * Walk the impl blocks of a struct or enum.
 *
 * @throws GraphError when an impl id does not resolve to an impl item
 */
export function collectMembers(graph: TypeGraph, item: GraphItem): MemberSet {
  let selfImpl: ImplInner | undefined;
  const implItems = new Map<string, ImplMember[]>();
  const implementedTraits = new Set<string>();

  for (const implId of implsOf(item)) {
    const implItem = graph.requireItem(implId);
    const impl = implItem.inner.impl;
    if (!impl) {
      throw new GraphError(
        `Expected an impl block for ${item.name ?? idKey(item.id)}, found a ${itemKind(implItem)} (item ${idKey(implId)})`,
        'ERR_UNEXPECTED_ITEM_KIND',
        { itemId: idKey(implId), typeName: item.name ?? undefined, filePath: graph.sourcePath }
      );
    }

    if (impl.trait) {
      implementedTraits.add(pathRefName(impl.trait));
    } else {
      selfImpl = impl;
    }

    for (const memberId of impl.items) {
      const member = graph.requireItem(memberId);
      if (member.name === null) continue;
      const entries = implItems.get(member.name);
      if (entries) {
        entries.push({ impl, member });
      } else {
        implItems.set(member.name, [{ impl, member }]);
      }
    }
  }

  return { selfImpl, implItems, implementedTraits };
}
