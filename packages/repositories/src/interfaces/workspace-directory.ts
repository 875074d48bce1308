import type { ContentStreamId, Workspace } from '@treegate/protocol';

/**
 * Looks up workspaces by the content stream they currently point at.
 */
export interface WorkspaceDirectory {
  /**
   * @returns The workspace whose current content stream is `contentStreamId`,
   * or null if no workspace points at it
   */
  findOneByCurrentContentStreamId(contentStreamId: ContentStreamId): Workspace | null;
}
