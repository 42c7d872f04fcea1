// File system abstractions for reading and writing policy miner files.
// Allows testing and different storage backends (filesystem, in-memory).

/**
 * Abstraction for writing files.
 */
export interface FileWriter {
  /**
   * Write a file with the given content.
   * Creates parent directories as needed.
   */
  writeFile(path: string, content: string): Promise<void>;

  /**
   * Check if a path exists.
   */
  exists(path: string): Promise<boolean>;
}

/**
 * Abstraction for reading files.
 */
export interface FileReader {
  /**
   * Check if a path exists.
   */
  exists(path: string): Promise<boolean>;

  /**
   * Read a file as text.
   */
  readFile(path: string): Promise<string>;
}
