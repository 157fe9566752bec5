/**
 * @fileoverview Overlay protocol envelope definitions.
 * Uses Zod for runtime validation of decoded envelopes.
 *
 * Every message is a `{ type, data }` envelope. Unknown fields inside `data`
 * are passed through so newer peers can add fields without breaking older ones.
 */

import { z } from 'zod';

// ============ Shared Schemas ============

/**
 * Raw component payload as carried on the wire. Its shape is checked by the
 * component registry, not here.
 */
export const PayloadDataSchema = z.record(z.unknown());
export type PayloadData = z.infer<typeof PayloadDataSchema>;

/**
 * Data of events that carry nothing. An absent `data` decodes as `{}`.
 */
const EmptyDataSchema = z.object({}).passthrough().default({});

const ComponentRefSchema = z.object({ component: z.string() }).passthrough();

// ============ Host -> Surface Commands ============

/**
 * Show a component. `duration` is in milliseconds; 0 keeps it up until hidden.
 */
export const ShowComponentMessage = z.object({
  type: z.literal('showComponent'),
  data: z
    .object({
      component: z.string(),
      duration: z.number().int().nonnegative(),
      data: PayloadDataSchema.optional(),
    })
    .passthrough(),
});

/**
 * Hide a component.
 */
export const HideComponentMessage = z.object({
  type: z.literal('hideComponent'),
  data: ComponentRefSchema,
});

/**
 * Merge fields into a component's payload without changing its visibility.
 */
export const UpdateComponentDataMessage = z.object({
  type: z.literal('updateComponentData'),
  data: z
    .object({
      component: z.string(),
      data: PayloadDataSchema,
    })
    .passthrough(),
});

// ============ Surface -> Host: User Interactions ============

export const FollowButtonClickedMessage = z.object({
  type: z.literal('followButtonClicked'),
  data: z.object({ brandName: z.string() }).passthrough(),
});

export const BuyNowButtonClickedMessage = z.object({
  type: z.literal('buyNowButtonClicked'),
  data: z.object({ productId: z.string() }).passthrough(),
});

export const ExploreButtonClickedMessage = z.object({
  type: z.literal('exploreButtonClicked'),
  data: EmptyDataSchema,
});

export const RewardBadgeClickedMessage = z.object({
  type: z.literal('rewardBadgeClicked'),
  data: z.object({ points: z.string() }).passthrough(),
});

// ============ Surface -> Host: Lifecycle ============

export const ComponentShownMessage = z.object({
  type: z.literal('componentShown'),
  data: ComponentRefSchema,
});

export const ComponentHiddenMessage = z.object({
  type: z.literal('componentHidden'),
  data: ComponentRefSchema,
});

/**
 * Sent once when the surface can accept commands.
 */
export const WebViewReadyMessage = z.object({
  type: z.literal('webViewReady'),
  data: EmptyDataSchema,
});

// ============ Unions ============

export const InboundEnvelope = z.discriminatedUnion('type', [
  ShowComponentMessage,
  HideComponentMessage,
  UpdateComponentDataMessage,
]);
export type InboundEnvelope = z.infer<typeof InboundEnvelope>;

export const UserInteractionEnvelope = z.discriminatedUnion('type', [
  FollowButtonClickedMessage,
  BuyNowButtonClickedMessage,
  ExploreButtonClickedMessage,
  RewardBadgeClickedMessage,
]);
export type UserInteractionEnvelope = z.infer<typeof UserInteractionEnvelope>;

export const LifecycleEnvelope = z.discriminatedUnion('type', [
  ComponentShownMessage,
  ComponentHiddenMessage,
  WebViewReadyMessage,
]);
export type LifecycleEnvelope = z.infer<typeof LifecycleEnvelope>;

/**
 * Every envelope of the protocol, in either direction.
 */
export const Envelope = z.discriminatedUnion('type', [
  ShowComponentMessage,
  HideComponentMessage,
  UpdateComponentDataMessage,
  FollowButtonClickedMessage,
  BuyNowButtonClickedMessage,
  ExploreButtonClickedMessage,
  RewardBadgeClickedMessage,
  ComponentShownMessage,
  ComponentHiddenMessage,
  WebViewReadyMessage,
]);
export type Envelope = z.infer<typeof Envelope>;

export type OutboundEnvelope = UserInteractionEnvelope | LifecycleEnvelope;

export type EventType = Envelope['type'];

// ============ Event Type Sets ============

export const INBOUND_EVENT_TYPES = [
  'showComponent',
  'hideComponent',
  'updateComponentData',
] as const satisfies readonly InboundEnvelope['type'][];

export const USER_INTERACTION_EVENT_TYPES = [
  'followButtonClicked',
  'buyNowButtonClicked',
  'exploreButtonClicked',
  'rewardBadgeClicked',
] as const satisfies readonly UserInteractionEnvelope['type'][];

export const LIFECYCLE_EVENT_TYPES = [
  'componentShown',
  'componentHidden',
  'webViewReady',
] as const satisfies readonly LifecycleEnvelope['type'][];

export const OUTBOUND_EVENT_TYPES = [...USER_INTERACTION_EVENT_TYPES, ...LIFECYCLE_EVENT_TYPES];

export const EVENT_TYPES: readonly EventType[] = [...INBOUND_EVENT_TYPES, ...OUTBOUND_EVENT_TYPES];

const EVENT_TYPE_SET: ReadonlySet<string> = new Set(EVENT_TYPES);

// ============ Guards ============

/**
 * Check whether a string is one of the protocol's event types.
 */
export function isEventType(value: string): value is EventType {
  return EVENT_TYPE_SET.has(value);
}

/**
 * Check whether an envelope is a host command.
 */
export function isInboundEnvelope(envelope: Envelope): envelope is InboundEnvelope {
  switch (envelope.type) {
    case 'showComponent':
    case 'hideComponent':
    case 'updateComponentData':
      return true;
    default:
      return false;
  }
}

/**
 * Check whether an envelope reports a user interaction.
 */
export function isUserInteractionEnvelope(
  envelope: Envelope
): envelope is UserInteractionEnvelope {
  switch (envelope.type) {
    case 'followButtonClicked':
    case 'buyNowButtonClicked':
    case 'exploreButtonClicked':
    case 'rewardBadgeClicked':
      return true;
    default:
      return false;
  }
}
