// Raw entry as exposed by a feed source, before normalization
export interface FeedEntry {
  id?: string;               // Feed-provided identifier (RSS guid, Atom id)
  title?: string;
  link?: string;
  published?: string;        // Date string exactly as the feed wrote it
  updated?: string;
  summary?: string;          // May contain HTML
  content?: string;          // Structured/full content, may contain HTML
  author?: string;
  tags: string[];
}

export type FeedFetchResult =
  | {
      success: true;
      feedTitle: string;
      feedLink: string;
      entries: FeedEntry[];
      fetchedAt: string;     // ISO 8601, Z-suffixed
    }
  | {
      success: false;
      error: string;
    };

// Contract every feed source adapter implements
export interface FeedSource {
  fetch(url: string, timeoutSeconds: number): Promise<FeedFetchResult>;
}

// A configured feed as stored in feeds.json
export interface FeedConfig {
  id: string;
  url: string;
  name: string;
  tags: string[];
  added: string;
}
