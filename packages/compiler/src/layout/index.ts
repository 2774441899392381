export { detectLayoutMode, inferLayout, type LayoutResult } from './infer-layout.js';
