export interface ArtifactStorage {
  write(key: string, content: string): Promise<void>;
  /** Stored content, or null if nothing exists under this key */
  read(key: string): Promise<string | null>;
  healthCheck(): Promise<boolean>;
}
