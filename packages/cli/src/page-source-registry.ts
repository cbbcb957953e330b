import type { PageSourcePort } from '@cubesheet/core';

export class PageSourceRegistry {
  private readonly sources: Map<string, PageSourcePort> = new Map();

  register(source: PageSourcePort): void {
    for (const ext of source.extensions) {
      this.sources.set(ext.toLowerCase(), source);
    }
  }

  getSourceForExtension(extension: string): PageSourcePort | undefined {
    return this.sources.get(extension.toLowerCase());
  }

  getSupportedExtensions(): string[] {
    return Array.from(this.sources.keys());
  }

  toMap(): Map<string, PageSourcePort> {
    return new Map(this.sources);
  }
}
