import type { BlockOptions } from '@pandora/contracts';

interface FragmentBase {
  /** 1-based line of the first character of the fragment. */
  line: number;
}

interface ContentFragmentBase extends FragmentBase {
  sequenceIndex: number;
  payload: string;
  options: BlockOptions;
}

export interface TextFragment extends ContentFragmentBase {
  kind: 'text';
}

export interface AnimationSceneFragment extends ContentFragmentBase {
  kind: 'animation-scene';
}

export interface AnimationInlineFragment extends ContentFragmentBase {
  kind: 'animation-inline';
}

export interface ImageFragment extends ContentFragmentBase {
  kind: 'image';
}

export interface VideoFragment extends ContentFragmentBase {
  kind: 'video';
}

/** `\newpage`, `\breakpage` and `%% pagebreak` all normalize to this marker. */
export interface PageBreakMarker extends FragmentBase {
  kind: 'page-break';
  spelling: 'newpage' | 'breakpage' | 'directive';
}

/** `\twocolumn` and `%% twocolumn`. Emitted without splitting the text around it. */
export interface LayoutDirectiveMarker extends FragmentBase {
  kind: 'layout-directive';
  mode: 'two-column';
  spelling: 'command' | 'directive';
}

export type ContentFragment =
  | TextFragment
  | AnimationSceneFragment
  | AnimationInlineFragment
  | ImageFragment
  | VideoFragment;

export type Fragment = ContentFragment | PageBreakMarker | LayoutDirectiveMarker;

export type SegmentWarningCode = 'MALFORMED_COMMAND' | 'UNTERMINATED_ENVIRONMENT';

/** Parse-local problem that was recovered by treating the command as text. */
export interface SegmentWarning {
  code: SegmentWarningCode;
  message: string;
  line: number;
}

export interface SegmentedDocument {
  fragments: Fragment[];
  warnings: SegmentWarning[];
}

export function isContentFragment(fragment: Fragment): fragment is ContentFragment {
  return fragment.kind !== 'page-break' && fragment.kind !== 'layout-directive';
}
