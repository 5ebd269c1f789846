// In-process virtual file system backing the `vfs` scheme

/**
 * Named volumes of `/`-separated paths mapped to file contents
 */
export class VirtualFileSystem {
  private readonly volumes = new Map<string, Map<string, Uint8Array>>();
  private static shared: VirtualFileSystem | null = null;

  /**
   * Process-wide instance used by the default `vfs` factory
   */
  static getInstance(): VirtualFileSystem {
    if (!VirtualFileSystem.shared) {
      VirtualFileSystem.shared = new VirtualFileSystem();
    }
    return VirtualFileSystem.shared;
  }

  /**
   * Mounts a volume, replacing any volume with the same name
   */
  mount(volume: string, files: Record<string, Uint8Array | string> = {}): void {
    const entries = new Map<string, Uint8Array>();
    for (const [filePath, content] of Object.entries(files)) {
      entries.set(normalize(filePath), toBytes(content));
    }
    this.volumes.set(volume, entries);
  }

  unmount(volume: string): boolean {
    return this.volumes.delete(volume);
  }

  hasVolume(volume: string): boolean {
    return this.volumes.has(volume);
  }

  write(volume: string, filePath: string, content: Uint8Array | string): void {
    let entries = this.volumes.get(volume);
    if (!entries) {
      entries = new Map<string, Uint8Array>();
      this.volumes.set(volume, entries);
    }
    entries.set(normalize(filePath), toBytes(content));
  }

  read(volume: string, filePath: string): Uint8Array | undefined {
    return this.volumes.get(volume)?.get(normalize(filePath));
  }

  delete(volume: string, filePath: string): boolean {
    return this.volumes.get(volume)?.delete(normalize(filePath)) ?? false;
  }

  /**
   * Paths under `prefix` (a directory path, '' for the whole volume), sorted
   */
  list(volume: string, prefix: string): string[] {
    const entries = this.volumes.get(volume);
    if (!entries) {
      return [];
    }
    const base = normalize(prefix);
    const result: string[] = [];
    for (const filePath of entries.keys()) {
      if (base === '' || filePath.startsWith(`${base}/`)) {
        result.push(filePath);
      }
    }
    return result.sort();
  }
}

function normalize(filePath: string): string {
  return filePath.split('/').filter(segment => segment.length > 0).join('/');
}

function toBytes(content: Uint8Array | string): Uint8Array {
  return typeof content === 'string' ? new TextEncoder().encode(content) : content;
}
