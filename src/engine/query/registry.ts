/**
 * blockquery — Name registry
 *
 * Lookup tables that turn the names written in a query (block identifiers,
 * %/$ type tags, ~ material tags) into resolved registry entries.
 * Populated by the host before compilation; read-only afterwards.
 */

import { CatalogError, RegistryFrozenError } from './types.js';
import type { BlockDefinition, MaterialTag, NameResolver, TypeTag } from './types.js';

/** Type tag search path: the name as written, then custom tags, then core tags. */
export const DEFAULT_TYPE_TAG_PREFIXES: readonly string[] = ['', 'custom.', 'core.'];

export const DEFAULT_NAMESPACE = 'core';

export interface NameRegistryOptions {
  /** Prefixes tried in order when resolving a type tag name (first match wins) */
  typeTagPrefixes?: readonly string[];
  /** Namespace given to identifiers written without one */
  defaultNamespace?: string;
}

export interface DefineBlockInput {
  identifier: string;
  typeTag: string;
  material: string;
  empty?: boolean;
}

export class NameRegistry implements NameResolver {
  readonly typeTagPrefixes: readonly string[];
  readonly defaultNamespace: string;

  private readonly blockTable: Map<string, BlockDefinition> = new Map();
  private readonly typeTagTable: Map<string, TypeTag> = new Map();
  private readonly materialTable: Map<string, MaterialTag> = new Map();
  private frozen = false;

  constructor(options?: NameRegistryOptions) {
    this.typeTagPrefixes = Object.freeze([
      ...(options?.typeTagPrefixes ?? DEFAULT_TYPE_TAG_PREFIXES),
    ]);
    this.defaultNamespace = options?.defaultNamespace ?? DEFAULT_NAMESPACE;
  }

  get isFrozen(): boolean {
    return this.frozen;
  }

  /** Disallow any further definitions. */
  freeze(): void {
    this.frozen = true;
  }

  // ===========================================================
  // Definitions
  // ===========================================================

  /**
   * Define a material tag. Blocks hold the instance, so a name can only be defined once.
   *
   * @throws CatalogError when the material is already defined
   */
  defineMaterial(name: string): MaterialTag {
    this.assertWritable();
    if (this.materialTable.has(name)) {
      throw new CatalogError(`Material '${name}' is already defined`);
    }
    const material: MaterialTag = Object.freeze({ name });
    this.materialTable.set(name, material);
    return material;
  }

  /**
   * Define a type tag, optionally deriving from an already defined parent.
   * Like materials, a tag name can only be defined once.
   *
   * @throws CatalogError when the tag is already defined or the parent is not
   */
  defineTypeTag(name: string, parentName?: string): TypeTag {
    this.assertWritable();
    if (this.typeTagTable.has(name)) {
      throw new CatalogError(`Type tag '${name}' is already defined`);
    }
    let tag: TypeTag;
    if (parentName !== undefined) {
      const parent = this.typeTagTable.get(parentName);
      if (parent === undefined) {
        throw new CatalogError(`Type tag '${name}' derives from undefined tag '${parentName}'`);
      }
      tag = Object.freeze({ name, parent });
    } else {
      tag = Object.freeze({ name });
    }
    this.typeTagTable.set(name, tag);
    return tag;
  }

  /**
   * Define a block from already defined type and material tags.
   * Redefining an identifier replaces the earlier block.
   *
   * @throws CatalogError when the type tag or material is not defined
   */
  defineBlock(input: DefineBlockInput): BlockDefinition {
    this.assertWritable();
    const typeTag = this.typeTagTable.get(input.typeTag);
    if (typeTag === undefined) {
      throw new CatalogError(
        `Block '${input.identifier}' uses undefined type tag '${input.typeTag}'`,
      );
    }
    const material = this.materialTable.get(input.material);
    if (material === undefined) {
      throw new CatalogError(
        `Block '${input.identifier}' uses undefined material '${input.material}'`,
      );
    }
    const block: BlockDefinition = Object.freeze({
      identifier: this.canonicalIdentifier(input.identifier),
      typeTag,
      material,
      empty: input.empty ?? false,
    });
    this.blockTable.set(block.identifier, block);
    return block;
  }

  // ===========================================================
  // Resolution
  // ===========================================================

  /** `stone` and `core:stone` both resolve to `core:stone`. */
  resolveIdentifier(text: string): string | undefined {
    return this.blockTable.get(this.canonicalIdentifier(text))?.identifier;
  }

  resolveTypeTag(text: string): TypeTag | undefined {
    for (const prefix of this.typeTagPrefixes) {
      const tag = this.typeTagTable.get(prefix + text);
      if (tag !== undefined) {
        return tag;
      }
    }
    return undefined;
  }

  resolveMaterialTag(text: string): MaterialTag | undefined {
    return this.materialTable.get(text);
  }

  block(identifier: string): BlockDefinition | undefined {
    return this.blockTable.get(this.canonicalIdentifier(identifier));
  }

  blocks(): BlockDefinition[] {
    return [...this.blockTable.values()];
  }

  typeTags(): TypeTag[] {
    return [...this.typeTagTable.values()];
  }

  materials(): MaterialTag[] {
    return [...this.materialTable.values()];
  }

  canonicalIdentifier(text: string): string {
    return text.includes(':') ? text : `${this.defaultNamespace}:${text}`;
  }

  private assertWritable(): void {
    if (this.frozen) {
      throw new RegistryFrozenError('the name registry');
    }
  }
}

/** True when `tag` is `ancestor` or derives from it. */
export function isTypeTagDerivedFrom(tag: TypeTag, ancestor: TypeTag): boolean {
  let current: TypeTag | undefined = tag;
  while (current !== undefined) {
    if (current === ancestor) {
      return true;
    }
    current = current.parent;
  }
  return false;
}
