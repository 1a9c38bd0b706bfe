import { Bookmark } from '../value-objects/Bookmark';

/**
 * An acquired bookmark lock. Valid until `close()`; nothing else may ship
 * from the same buffer while it is held.
 */
export interface BookmarkHandle {
  read(): Promise<Bookmark>;

  /**
   * Replace the persisted record (truncate, then a single write)
   */
  write(bookmark: Bookmark): Promise<void>;

  close(): Promise<void>;
}

export interface BookmarkRepository {
  /**
   * Try to take the bookmark lock without waiting.
   * Resolves to null when another shipper holds it.
   */
  open(): Promise<BookmarkHandle | null>;
}
