// Common types used across the protocol

/**
 * Identifier of a node aggregate. Stable across dimension variants and
 * content streams; validated by parseNodeAggregateId.
 */
export type NodeAggregateId = string;

/**
 * Identifier of a content stream (the event stream a workspace points at)
 */
export type ContentStreamId = string;

/**
 * Identifier of a content repository
 */
export type ContentRepositoryId = string;

/**
 * Fully qualified node type name, e.g. "Acme.Site:Document.Page"
 */
export type NodeTypeName = string;

/**
 * Absolute, `/`-delimited node path, e.g. "/sites/acme/about"
 */
export type NodePath = string;
