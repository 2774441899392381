export { dispatchRenders, type DispatchOptions, type DispatchResult, type RenderWarning } from './dispatch-renders.js';
export { planAssetPaths, type AssetExtensions } from './plan-assets.js';
