import {
  RENDER_FAILED_ASSET_REF,
  groupIntoPages,
  type DocumentManifest,
  type LayoutMode,
  type ManifestBlock,
} from '@pandora/contracts';
import { readArchiveEntries } from './archive-reader.js';
import { mediaTypeFor } from './media-types.js';

export interface ViewerPage {
  /** 0-based page number. */
  index: number;
  columns: 1 | 2;
  blocks: ManifestBlock[];
}

export type ResolvedBlock =
  | { status: 'ready'; block: ManifestBlock; mediaType: string; bytes: Uint8Array }
  | { status: 'failed'; block: ManifestBlock; placeholder: string };

export interface ResolvedPage extends ViewerPage {
  resolved: ResolvedBlock[];
}

/**
 * In-memory, read-only view of a validated archive.
 *
 * Pages are computed up front; assets are decompressed per page on demand and
 * cached. {@link openPage} also resolves the neighbouring pages so they are
 * ready before they scroll into view.
 */
export class PaginatedDocument {
  readonly layoutMode: LayoutMode;
  readonly pages: readonly ViewerPage[];
  private readonly bytes: Uint8Array;
  private readonly resolvedPages = new Map<number, ResolvedPage>();

  constructor(manifest: DocumentManifest, bytes: Uint8Array) {
    this.layoutMode = manifest.layout_mode;
    this.bytes = bytes;
    const columns = manifest.layout_mode === 'two-column' ? 2 : 1;
    this.pages = groupIntoPages(manifest.blocks, (block) => block.page_break_before).map((page) => ({
      index: page.index,
      columns,
      blocks: page.blocks,
    }));
  }

  get pageCount(): number {
    return this.pages.length;
  }

  get blockCount(): number {
    return this.pages.reduce((total, page) => total + page.blocks.length, 0);
  }

  /**
   * @throws {RangeError} when `index` is not a page of this document
   */
  getPage(index: number): ViewerPage {
    const page = this.pages[index];
    if (!Number.isInteger(index) || page === undefined) {
      throw new RangeError(`Page ${index} does not exist (document has ${this.pages.length} pages).`);
    }
    return page;
  }

  isResolved(index: number): boolean {
    return this.resolvedPages.has(index);
  }

  /** Resolves the assets of one page, reusing earlier results. */
  async resolvePage(index: number): Promise<ResolvedPage> {
    const cached = this.resolvedPages.get(index);
    if (cached) return cached;

    const page = this.getPage(index);
    const wanted = new Set(
      page.blocks.map((block) => block.asset_ref).filter((ref): ref is string => ref !== null && ref !== RENDER_FAILED_ASSET_REF),
    );
    const files = readArchiveEntries(this.bytes, wanted);

    const resolved = page.blocks.map((block): ResolvedBlock => {
      const ref = block.asset_ref;
      const bytes = ref === null ? undefined : files[ref];
      if (ref === null || bytes === undefined) {
        return { status: 'failed', block, placeholder: `Block ${block.sequence_index} (${block.kind}) failed to render` };
      }
      return { status: 'ready', block, mediaType: mediaTypeFor(ref), bytes };
    });

    const result: ResolvedPage = { ...page, resolved };
    this.resolvedPages.set(index, result);
    return result;
  }

  /**
   * Resolves page `index` and its immediate neighbours, returning the page
   * itself.
   */
  async openPage(index: number): Promise<ResolvedPage> {
    const page = this.getPage(index);
    const neighbours = [page.index - 1, page.index + 1].filter((n) => n >= 0 && n < this.pages.length);
    const [current] = await Promise.all([this.resolvePage(page.index), ...neighbours.map((n) => this.resolvePage(n))]);
    return current;
  }
}
