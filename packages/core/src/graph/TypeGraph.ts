/**
 * TypeGraph - read-only view over one rustdoc JSON document
 *
 * Ids are normalized to string keys, so numeric ids from newer format
 * versions and string ids from older ones look the same to callers.
 */

import type { GraphItem, ItemId, ItemSummary, TypeGraphDocument } from '@scriptwrap/types';
import { GraphError } from '../errors/ScriptwrapError.js';
import { idKey } from './items.js';

export class TypeGraph {
  readonly document: TypeGraphDocument;
  /** File the document was read from, when it came from disk */
  readonly sourcePath: string | undefined;

  constructor(document: TypeGraphDocument, sourcePath?: string) {
    this.document = document;
    this.sourcePath = sourcePath;
  }

  get formatVersion(): number {
    return this.document.format_version;
  }

  /**
   * Name of the documented crate (first path segment of the root item)
   */
  get crateName(): string {
    const rootKey = idKey(this.document.root);
    return this.document.paths[rootKey]?.path[0] ?? this.document.index[rootKey]?.name ?? rootKey;
  }

  /** Label used in error messages */
  get label(): string {
    return this.sourcePath ?? this.crateName;
  }

  getItem(id: ItemId): GraphItem | undefined {
    return this.document.index[idKey(id)];
  }

  /**
   * @throws GraphError when the id is not in the index
   */
  requireItem(id: ItemId): GraphItem {
    const item = this.getItem(id);
    if (!item) {
      throw new GraphError(
        `Item ${idKey(id)} is referenced but missing from ${this.label}`,
        'ERR_ITEM_NOT_FOUND',
        { itemId: idKey(id), filePath: this.sourcePath }
      );
    }
    return item;
  }

  getSummary(id: ItemId): ItemSummary | undefined {
    return this.document.paths[idKey(id)];
  }

  /**
   * Every item of the index in document order
   */
  *items(): IterableIterator<[string, GraphItem]> {
    for (const [key, item] of Object.entries(this.document.index)) {
      yield [key, item];
    }
  }
}
