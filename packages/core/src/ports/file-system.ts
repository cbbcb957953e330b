export interface FileSystemPort {
  writeFile(path: string, data: Uint8Array): Promise<void>;
}
