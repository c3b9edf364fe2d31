export interface ContentStore {
  put(bytes: Buffer, suggestedName: string): Promise<string>;
  read(storedPath: string): Promise<Buffer>;
  delete(storedPath: string): Promise<void>;
}
