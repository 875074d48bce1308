import type { ContentStreamId } from './common.js';

/**
 * A workspace names the content stream its changes currently live in.
 * Node membership in a workspace is derived from the node's content stream.
 */
export type Workspace = {
  readonly workspaceName: string;
  readonly currentContentStreamId: ContentStreamId;
};
