/**
 * @fileoverview Overlay protocol definitions.
 *
 * This package defines the envelopes exchanged between a host process and an
 * overlay surface, the catalog of overlay components, and the registry that
 * validates component payloads. Both sides import it so the closed set of
 * event types lives in one place.
 */

export { type DecodeResult, decodeEnvelope, encodeEnvelope } from './codec.js';
export {
  BrandFollowCardPayloadSchema,
  COMPONENT_KINDS,
  COMPONENT_PAYLOAD_SCHEMAS,
  CONTROLLABLE_COMPONENT_KINDS,
  ComponentKindSchema,
  ExploreButtonPayloadSchema,
  ItemCardPayloadSchema,
  RewardBadgePayloadSchema,
} from './components.js';
export type {
  BrandFollowCardPayload,
  ComponentKind,
  ComponentPayload,
  ComponentPayloadInputMap,
  ComponentPayloadMap,
  ComponentPayloadPatchMap,
  ControllableComponentKind,
  ExploreButtonPayload,
  ItemCardPayload,
  PayloadValue,
  RewardBadgePayload,
} from './components.js';
export {
  DuplicateComponentError,
  InvalidPayloadError,
  MalformedEnvelopeError,
  type OverlayErrorCode,
  OverlayProtocolError,
  PinnedComponentError,
  UnknownComponentError,
  UnknownEventTypeError,
} from './errors.js';
export {
  BuyNowButtonClickedMessage,
  ComponentHiddenMessage,
  ComponentShownMessage,
  EVENT_TYPES,
  Envelope,
  type EventType,
  ExploreButtonClickedMessage,
  FollowButtonClickedMessage,
  HideComponentMessage,
  INBOUND_EVENT_TYPES,
  InboundEnvelope,
  isEventType,
  isInboundEnvelope,
  isUserInteractionEnvelope,
  LIFECYCLE_EVENT_TYPES,
  LifecycleEnvelope,
  OUTBOUND_EVENT_TYPES,
  type OutboundEnvelope,
  type PayloadData,
  PayloadDataSchema,
  RewardBadgeClickedMessage,
  ShowComponentMessage,
  UpdateComponentDataMessage,
  USER_INTERACTION_EVENT_TYPES,
  UserInteractionEnvelope,
  WebViewReadyMessage,
} from './messages.js';
export {
  COMPONENT_DEFINITIONS,
  type ComponentDefinition,
  ComponentRegistry,
  createComponentRegistry,
  type PayloadValidation,
} from './registry.js';

/**
 * Overlay protocol version.
 */
export const OVERLAY_PROTOCOL_VERSION = '1.0.0';
