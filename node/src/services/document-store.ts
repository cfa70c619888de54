// Authoritative copy of every indexed document, keyed by docId.
import type { TravelDocument } from '@/types/core';

export class DocumentStore {
  private readonly docs = new Map<string, TravelDocument>();

  get size(): number {
    return this.docs.size;
  }

  get(docId: string): TravelDocument | undefined {
    return this.docs.get(docId);
  }

  has(docId: string): boolean {
    return this.docs.has(docId);
  }

  put(doc: TravelDocument): void {
    this.docs.set(doc.docId, doc);
  }

  delete(docId: string): boolean {
    return this.docs.delete(docId);
  }

  ids(): string[] {
    return [...this.docs.keys()];
  }

  all(): TravelDocument[] {
    return [...this.docs.values()];
  }

  clear(): void {
    this.docs.clear();
  }
}
