import {
  type CapabilityCategory,
  DuplicateKeyError,
  NotFoundError,
  RegistrySealedError
} from '@plinth/core';
import { type CapabilityDefinition, type DefinitionOf, keyOf } from './types.js';

type RegistryState = {
  [C in CapabilityCategory]: Map<string, DefinitionOf<C>>;
};

/**
 * Capability Registry - tools, resources and prompts keyed by name or URI
 *
 * Populated during setup only. Once sealed the maps are never written
 * again, so reads need no locking while serving.
 */
export class CapabilityRegistry {
  private readonly state: RegistryState = {
    tool: new Map(),
    resource: new Map(),
    prompt: new Map()
  };
  private isSealed = false;

  /**
   * Register a definition
   * @throws DuplicateKeyError when the key is taken within its category
   * @throws RegistrySealedError after seal()
   */
  register(definition: CapabilityDefinition): void {
    const key = keyOf(definition);
    if (this.isSealed) {
      throw new RegistrySealedError(definition.kind, key);
    }

    switch (definition.kind) {
      case 'tool':
        this.insert(this.state.tool, definition, key);
        break;
      case 'resource':
        this.insert(this.state.resource, definition, key);
        break;
      case 'prompt':
        this.insert(this.state.prompt, definition, key);
        break;
    }
  }

  get<C extends CapabilityCategory>(category: C, key: string): DefinitionOf<C> | undefined {
    return this.mapOf(category).get(key);
  }

  /**
   * Like get(), but unknown keys raise NotFoundError
   */
  require<C extends CapabilityCategory>(category: C, key: string): DefinitionOf<C> {
    const definition = this.get(category, key);
    if (!definition) {
      throw new NotFoundError(category, key);
    }
    return definition;
  }

  has(category: CapabilityCategory, key: string): boolean {
    return this.mapOf(category).has(key);
  }

  /** Definitions in registration order */
  list<C extends CapabilityCategory>(category: C): DefinitionOf<C>[] {
    return Array.from(this.mapOf(category).values());
  }

  size(category: CapabilityCategory): number {
    return this.mapOf(category).size;
  }

  /** Close registration; called when the server starts accepting traffic */
  seal(): void {
    this.isSealed = true;
  }

  get sealed(): boolean {
    return this.isSealed;
  }

  private mapOf<C extends CapabilityCategory>(category: C): Map<string, DefinitionOf<C>> {
    return this.state[category];
  }

  private insert<D extends CapabilityDefinition>(map: Map<string, D>, definition: D, key: string): void {
    if (map.has(key)) {
      throw new DuplicateKeyError(definition.kind, key);
    }
    map.set(key, definition);
  }
}
