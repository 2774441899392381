/**
 * Contracts for the `.pandora` archive format shared between the compiler and
 * the viewer.
 */

export * from './types.js';

export {
  ARCHIVE_EXTENSION,
  ASSET_NAMESPACES,
  BLOCK_KINDS,
  LAYOUT_MODES,
  MANIFEST_FILE,
  MANIFEST_FORMAT,
  MANIFEST_FORMAT_VERSION,
  RENDER_FAILED_ASSET_REF,
  isBlockKind,
  isLayoutMode,
  namespaceForKind,
  type AssetNamespace,
} from './constants.js';

export { buildManifest, serializeManifest, toManifestBlock } from './manifest.js';
export { groupIntoPages } from './pagination.js';

export {
  renderFailure,
  type AnimationRenderRequest,
  type AnimationRenderer,
  type MathRenderRequest,
  type MathRenderer,
  type MathStyle,
  type RenderFailure,
  type RenderFailureCode,
  type RenderOutcome,
  type RendererSet,
} from './render.js';
