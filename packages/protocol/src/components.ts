/**
 * @fileoverview Overlay component catalog.
 * Uses Zod for the per-kind payload schemas.
 */

import { z } from 'zod';

// ============ Payload Schemas ============

/**
 * Brand card with a follow button.
 */
export const BrandFollowCardPayloadSchema = z.object({
  brandName: z.string(),
  followers: z.string(),
  logoUrl: z.string().optional(),
  isVerified: z.boolean().default(true),
});

/**
 * Product card with pricing and a buy-now button.
 */
export const ItemCardPayloadSchema = z.object({
  imageUrl: z.string(),
  currentPrice: z.string(),
  badge: z.string().optional(),
  originalPrice: z.string().optional(),
  discount: z.string().optional(),
  productId: z.string().optional(),
});

/**
 * Reward badge announcing earned points.
 */
export const RewardBadgePayloadSchema = z.object({
  points: z.string(),
  message: z.string().optional(),
  iconUrl: z.string().optional(),
});

/**
 * The explore button carries no data.
 */
export const ExploreButtonPayloadSchema = z.object({});

/**
 * Payload schema per component kind.
 */
export const COMPONENT_PAYLOAD_SCHEMAS = {
  brandFollowCard: BrandFollowCardPayloadSchema,
  itemCard: ItemCardPayloadSchema,
  rewardBadge: RewardBadgePayloadSchema,
  exploreButton: ExploreButtonPayloadSchema,
} as const;

// ============ Kinds ============

export const COMPONENT_KINDS = ['brandFollowCard', 'itemCard', 'rewardBadge', 'exploreButton'] as const;

export const ComponentKindSchema = z.enum(COMPONENT_KINDS);
export type ComponentKind = z.infer<typeof ComponentKindSchema>;

/**
 * Kinds the host may show, hide and update. The explore button is always visible.
 */
export type ControllableComponentKind = Exclude<ComponentKind, 'exploreButton'>;

export const CONTROLLABLE_COMPONENT_KINDS: readonly ControllableComponentKind[] = [
  'brandFollowCard',
  'itemCard',
  'rewardBadge',
];

// ============ Payload Types ============

export type PayloadValue = string | boolean;

/**
 * A validated payload as the controller stores it. Opaque beyond its shape.
 */
export type ComponentPayload = Readonly<Record<string, PayloadValue | undefined>>;

export type BrandFollowCardPayload = z.infer<typeof BrandFollowCardPayloadSchema>;
export type ItemCardPayload = z.infer<typeof ItemCardPayloadSchema>;
export type RewardBadgePayload = z.infer<typeof RewardBadgePayloadSchema>;
export type ExploreButtonPayload = z.infer<typeof ExploreButtonPayloadSchema>;

/**
 * Validated payload type per kind.
 */
export type ComponentPayloadMap = {
  [K in ComponentKind]: z.infer<(typeof COMPONENT_PAYLOAD_SCHEMAS)[K]>;
};

/**
 * Payload accepted on the wire per kind (defaults not yet applied).
 */
export type ComponentPayloadInputMap = {
  [K in ComponentKind]: z.input<(typeof COMPONENT_PAYLOAD_SCHEMAS)[K]>;
};

/**
 * Partial payload accepted by updateComponentData per kind.
 */
export type ComponentPayloadPatchMap = {
  [K in ComponentKind]: Partial<ComponentPayloadInputMap[K]>;
};
