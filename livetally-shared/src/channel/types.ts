export interface ChannelInfo {
  chatroomId: number | null;
  viewerCount: number | null;
}

/** Channel lookups needed before a session starts. */
export interface ChannelDirectory {
  resolveChannel(name: string): Promise<ChannelInfo>;
  resolveStreamUrl(name: string): Promise<string | null>;
}

/** Periodic viewer-count source. */
export interface ViewerCountSource {
  fetchViewerCount(name: string): Promise<number | null>;
}
