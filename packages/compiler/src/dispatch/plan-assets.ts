import { posix } from 'node:path';
import { namespaceForKind, type Block } from '@pandora/contracts';

export interface AssetExtensions {
  /** Extension of rendered math assets, without the dot. */
  math: string;
  /** Extension of rendered animation assets, without the dot. */
  animation: string;
}

/** Basename of an author-supplied path, whichever separator it uses. */
function referencedName(resourcePath: string): string {
  const name = resourcePath.split(/[\\/]/).filter(Boolean).pop();
  return name === undefined || name === '.' || name === '..' ? 'asset' : name;
}

function withSuffix(name: string, suffix: number): string {
  const ext = posix.extname(name);
  const stem = ext ? name.slice(0, -ext.length) : name;
  return `${stem}-${suffix}${ext}`;
}

function preferredPath(block: Block, extensions: AssetExtensions): string {
  const namespace = namespaceForKind(block.kind);
  switch (block.kind) {
    case 'text':
      return `${namespace}/block_${block.sequenceIndex}.${extensions.math}`;
    case 'animation-scene':
    case 'animation-inline':
      return `${namespace}/scene_${block.sequenceIndex}.${extensions.animation}`;
    case 'image':
    case 'video':
      return `${namespace}/${referencedName(block.rawPayload)}`;
  }
}

/**
 * Assigns every block its archive path, in sequence order.
 *
 * Rendered assets are named after the sequence index (`latex/block_3.svg`,
 * `animations/scene_4.mp4`). Copied media keep their file name; a name already
 * taken in the namespace gets a numeric suffix, so no path is ever shared.
 */
export function planAssetPaths(blocks: readonly Block[], extensions: AssetExtensions): string[] {
  const taken = new Set<string>();

  return blocks.map((block) => {
    const preferred = preferredPath(block, extensions);
    let candidate = preferred;
    for (let suffix = 1; taken.has(candidate); suffix += 1) {
      candidate = `${posix.dirname(preferred)}/${withSuffix(posix.basename(preferred), suffix)}`;
    }
    taken.add(candidate);
    return candidate;
  });
}
