/**
 * @fileoverview Component registry.
 *
 * The registry is the single source of truth for which `component` strings
 * the protocol accepts and what data each kind carries. It is built once from
 * a fixed list of definitions and never changes afterwards.
 */

import type { z } from 'zod';
import {
  COMPONENT_PAYLOAD_SCHEMAS,
  type ComponentKind,
  type ComponentPayload,
} from './components.js';
import { DuplicateComponentError, InvalidPayloadError, UnknownComponentError } from './errors.js';

/**
 * Static description of one component kind.
 */
export interface ComponentDefinition {
  readonly kind: ComponentKind;

  /** Validates a complete payload and applies defaults */
  readonly payloadSchema: z.ZodType<ComponentPayload, z.ZodTypeDef, unknown>;

  /** Pinned components are always visible and accept no control commands */
  readonly pinned: boolean;

  readonly description?: string;
}

/**
 * Result of validating a candidate payload.
 */
export type PayloadValidation =
  | { readonly success: true; readonly payload: ComponentPayload }
  | { readonly success: false; readonly error: InvalidPayloadError };

/**
 * Definitions of the built-in overlay components.
 */
export const COMPONENT_DEFINITIONS: readonly ComponentDefinition[] = [
  {
    kind: 'brandFollowCard',
    payloadSchema: COMPONENT_PAYLOAD_SCHEMAS.brandFollowCard,
    pinned: false,
    description: 'Brand card with follower count and a follow button',
  },
  {
    kind: 'itemCard',
    payloadSchema: COMPONENT_PAYLOAD_SCHEMAS.itemCard,
    pinned: false,
    description: 'Product card with pricing and a buy-now button',
  },
  {
    kind: 'rewardBadge',
    payloadSchema: COMPONENT_PAYLOAD_SCHEMAS.rewardBadge,
    pinned: false,
    description: 'Badge announcing earned reward points',
  },
  {
    kind: 'exploreButton',
    payloadSchema: COMPONENT_PAYLOAD_SCHEMAS.exploreButton,
    pinned: true,
    description: 'Always-visible explore button',
  },
];

/**
 * Format zod issues as `path: message` strings.
 */
function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join('.');
    return path.length > 0 ? `${path}: ${issue.message}` : issue.message;
  });
}

/**
 * Component registry.
 *
 * @example
 * ```typescript
 * const registry = createComponentRegistry();
 *
 * if (registry.isKnownKind(command.component)) {
 *   const result = registry.validatePayload(command.component, command.data);
 * }
 * ```
 */
export class ComponentRegistry {
  private readonly definitions = new Map<string, ComponentDefinition>();

  /**
   * @throws {DuplicateComponentError} if two definitions share a kind
   */
  constructor(definitions: readonly ComponentDefinition[]) {
    for (const definition of definitions) {
      if (this.definitions.has(definition.kind)) {
        throw new DuplicateComponentError(definition.kind);
      }
      this.definitions.set(definition.kind, definition);
    }
  }

  /**
   * Check whether a string names a registered component kind.
   */
  isKnownKind(value: string): value is ComponentKind {
    return this.definitions.has(value);
  }

  /**
   * Get the definition for a kind.
   * @throws {UnknownComponentError} if the kind is not registered
   */
  schemaFor(kind: string): ComponentDefinition {
    const definition = this.definitions.get(kind);
    if (!definition) {
      throw new UnknownComponentError(kind);
    }
    return definition;
  }

  /**
   * Get the definition for a kind, or undefined if not registered.
   */
  lookup(kind: string): ComponentDefinition | undefined {
    return this.definitions.get(kind);
  }

  /**
   * Validate a complete candidate payload against a kind's schema.
   * Unknown fields are stripped; defaults are applied.
   * @throws {UnknownComponentError} if the kind is not registered
   */
  validatePayload(kind: string, candidate: unknown): PayloadValidation {
    const definition = this.schemaFor(kind);
    const result = definition.payloadSchema.safeParse(candidate);
    if (result.success) {
      return { success: true, payload: result.data };
    }
    return { success: false, error: new InvalidPayloadError(kind, formatIssues(result.error)) };
  }

  /**
   * List registered kinds in registration order.
   */
  listKinds(): ComponentKind[] {
    return [...this.definitions.values()].map((definition) => definition.kind);
  }

  get size(): number {
    return this.definitions.size;
  }
}

/**
 * Create a registry holding the built-in component catalog.
 */
export function createComponentRegistry(): ComponentRegistry {
  return new ComponentRegistry(COMPONENT_DEFINITIONS);
}
