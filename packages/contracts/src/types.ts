/**
 * Block and manifest contracts shared by the compiler and the viewer.
 */

/** Rendering kind of a content block. */
export type BlockKind = 'text' | 'animation-scene' | 'animation-inline' | 'image' | 'video';

/** Document-wide column count. */
export type LayoutMode = 'single-column' | 'two-column';

/** Parsed `[key=value, …]` optional argument. Values are kept as written. */
export type BlockOptions = Record<string, string>;

/**
 * In-memory block as it flows through the compiler.
 *
 * `assetRef` stays `null` until the render dispatcher resolves it; afterwards it
 * is either an archive-relative path or {@link RENDER_FAILED_ASSET_REF}.
 */
export interface Block {
  readonly sequenceIndex: number;
  readonly kind: BlockKind;
  /** Source text for text/animation blocks, resource path for image/video blocks. */
  readonly rawPayload: string;
  readonly options: BlockOptions;
  readonly pageBreakBefore: boolean;
  readonly assetRef: string | null;
  /** 1-based source line where the block starts. */
  readonly line: number;
}

/** Block entry as serialized into `meta.json`. Key order is part of the format. */
export interface ManifestBlock {
  sequence_index: number;
  kind: BlockKind;
  options: BlockOptions;
  asset_ref: string | null;
  page_break_before: boolean;
}

/** Serialized document metadata (`meta.json`). */
export interface DocumentManifest {
  format: 'pandora';
  format_version: number;
  layout_mode: LayoutMode;
  blocks: ManifestBlock[];
}

/** Blocks between two page boundaries. */
export interface PagePlan<T> {
  /** 0-based page number. */
  index: number;
  blocks: T[];
}
