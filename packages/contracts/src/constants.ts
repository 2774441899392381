import type { BlockKind, LayoutMode } from './types.js';

export const ARCHIVE_EXTENSION = '.pandora';
export const MANIFEST_FILE = 'meta.json';
export const MANIFEST_FORMAT = 'pandora';
export const MANIFEST_FORMAT_VERSION = 1;

/** `asset_ref` recorded for a block whose render failed. Resolves to no archive entry. */
export const RENDER_FAILED_ASSET_REF = 'pandora:render-failed';

export const BLOCK_KINDS: readonly BlockKind[] = ['text', 'animation-scene', 'animation-inline', 'image', 'video'];
export const LAYOUT_MODES: readonly LayoutMode[] = ['single-column', 'two-column'];

/** Archive directory for each asset category. */
export const ASSET_NAMESPACES = {
  math: 'latex',
  animation: 'animations',
  image: 'images',
  video: 'videos',
} as const;

export type AssetNamespace = (typeof ASSET_NAMESPACES)[keyof typeof ASSET_NAMESPACES];

export function namespaceForKind(kind: BlockKind): AssetNamespace {
  switch (kind) {
    case 'text':
      return ASSET_NAMESPACES.math;
    case 'animation-scene':
    case 'animation-inline':
      return ASSET_NAMESPACES.animation;
    case 'image':
      return ASSET_NAMESPACES.image;
    case 'video':
      return ASSET_NAMESPACES.video;
  }
}

export function isBlockKind(value: unknown): value is BlockKind {
  return typeof value === 'string' && BLOCK_KINDS.some((kind) => kind === value);
}

export function isLayoutMode(value: unknown): value is LayoutMode {
  return typeof value === 'string' && LAYOUT_MODES.some((mode) => mode === value);
}
