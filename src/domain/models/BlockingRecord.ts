export interface BlockingRecord {
  /** Relevant issues this one blocks */
  blocks: string[];
  /** Relevant issues blocking this one */
  isBlockedBy: string[];
}

export type BlockingMap = Map<string, BlockingRecord>;
