/**
 * Common type definitions shared by the routing engine and the session layer
 */

/**
 * Stable identifier for a customer across a conversation.
 *
 * Supplied by the client when it connects, or defaulted to the connection's
 * own identifier. The same UserId may appear on several connections over time
 * (reconnects), so conversation state is keyed by it rather than by ConnectionId.
 *
 * @example
 * const userId: UserId = "customer-42";
 */
export type UserId = string;

/**
 * Identifier of a single transport-level connection. Created on connect,
 * discarded on disconnect.
 */
export type ConnectionId = string;

/**
 * The closed set of handler variants known to the router.
 */
export const HANDLER_KINDS = ['general', 'technical', 'billing', 'escalation', 'order_lookup'] as const;

export type HandlerKind = (typeof HANDLER_KINDS)[number];

/**
 * Open key-value map attached to replies and log lines.
 */
export type Metadata = Record<string, unknown>;
