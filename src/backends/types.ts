/**
 * Durable store addressed by name, holding whole values
 * The unit of work imposes all transactional semantics on top of this
 */
interface Backend {
  /**
   * Returns false for absent entries
   * Never rejects for a well-formed name
   */
  exists(name: string): Promise<boolean>;

  /**
   * Returns `undefined` for absent entries
   */
  tryRead(name: string): Promise<Buffer | undefined>;

  /**
   * Creates or overwrites the entry
   */
  write(name: string, content: Buffer): Promise<void>;

  /**
   * Removes the entry
   * Rejects with `ErrorBackendNotFound` if the entry does not exist
   */
  delete(name: string): Promise<void>;
}

export type { Backend };
