import type {
  Alignment,
  AlertButton,
  ColorScheme,
  ContainerType,
  GradientStop,
  Presentation,
  TextAlignment,
} from '../document/documentTypes'
import type { StateStore } from '../state/stateStore'
import type { StateMap, StateValue } from '../state/stateValue'
import type { EdgeInsets, ResolvedStyle } from '../styles/styleResolver'

// --- actions ---

export type SetStateSource = { kind: 'literal'; value: StateValue } | { kind: 'expression'; expression: string }

export type ActionDefinition =
  | { type: 'dismiss' }
  | { type: 'setState'; path: string; value: SetStateSource }
  | { type: 'toggleState'; path: string }
  | { type: 'showAlert'; title: string; message?: { kind: 'static' | 'template'; value: string }; buttons: AlertButton[] }
  | { type: 'navigate'; destination: string; presentation: Presentation }
  | { type: 'sequence'; steps: ActionDefinition[] }
  | { type: 'custom'; actionType: string; parameters: StateMap }

/** How a component refers to the action it triggers. */
export type ActionRef = { kind: 'reference'; id: string } | { kind: 'inline'; action: ActionDefinition }

// --- nodes ---

export type ContainerNode = {
  kind: 'container'
  id?: string
  layoutType: ContainerType
  alignment: Alignment
  spacing: number
  padding: EdgeInsets
  style: ResolvedStyle
  children: RenderNode[]
}

export type GridColumns = { kind: 'fixed'; count: number } | { kind: 'adaptive'; minWidth: number }

export type SectionType =
  | { kind: 'horizontal' }
  | { kind: 'list' }
  | { kind: 'grid'; columns: GridColumns }
  | { kind: 'flow' }
  | { kind: 'custom'; name: string }

export type SectionConfig = {
  itemSpacing: number
  lineSpacing: number
  contentInsets: EdgeInsets
  showsIndicators: boolean
  isPagingEnabled: boolean
  snapBehavior: 'none' | 'viewAligned' | 'paging'
  showsDividers: boolean
  alignment: TextAlignment
}

export type SectionNode = {
  id?: string
  sectionType: SectionType
  config: SectionConfig
  header?: RenderNode
  footer?: RenderNode
  stickyHeader: boolean
  children: RenderNode[]
}

export type SectionLayoutNode = {
  kind: 'sectionLayout'
  id?: string
  sectionSpacing: number
  sections: SectionNode[]
}

/**
 * Where bound text came from, so renderers can re-read it after state changes.
 * `bindingScope` holds the loop variables that were in scope during resolution.
 */
export type ContentBinding = {
  bindingPath?: string
  bindingTemplate?: string
  bindingScope?: StateMap
}

export type TextNode = ContentBinding & {
  kind: 'text'
  id: string
  content: string
  style: ResolvedStyle
  padding: EdgeInsets
}

export type ButtonNode = ContentBinding & {
  kind: 'button'
  id: string
  label: string
  style: ResolvedStyle
  styles: { normal: ResolvedStyle; selected?: ResolvedStyle; disabled?: ResolvedStyle }
  padding: EdgeInsets
  isSelectedBinding?: string
  fillWidth: boolean
  onTap?: ActionRef
}

export type TextFieldNode = {
  kind: 'textField'
  id: string
  placeholder: string
  style: ResolvedStyle
  bindingPath?: string
  localBindingPath?: string
  onValueChanged?: ActionRef
}

export type ToggleNode = {
  kind: 'toggle'
  id: string
  label: string
  style: ResolvedStyle
  bindingPath?: string
  localBindingPath?: string
  onValueChanged?: ActionRef
}

export type SliderNode = {
  kind: 'slider'
  id: string
  style: ResolvedStyle
  minValue: number
  maxValue: number
  bindingPath?: string
  localBindingPath?: string
  onValueChanged?: ActionRef
}

export type ImageNodeSource = { kind: 'system'; name: string } | { kind: 'url'; url: string } | { kind: 'asset'; name: string }

export type ImageNode = {
  kind: 'image'
  id: string
  source: ImageNodeSource
  style: ResolvedStyle
  onTap?: ActionRef
}

export type GradientNode = {
  kind: 'gradient'
  id: string
  colors: GradientStop[]
  start: string
  end: string
  style: ResolvedStyle
}

export type DividerNode = {
  kind: 'divider'
  id: string
  style: ResolvedStyle
}

export type SpacerNode = {
  kind: 'spacer'
  minLength?: number
}

/** Output of component resolvers registered for kinds this library does not know. */
export type CustomNode = {
  kind: 'custom'
  customKind: string
  id: string
  style: ResolvedStyle
  props: StateMap
  children: RenderNode[]
}

export type RenderNode =
  | ContainerNode
  | SectionLayoutNode
  | TextNode
  | ButtonNode
  | TextFieldNode
  | ToggleNode
  | SliderNode
  | ImageNode
  | GradientNode
  | DividerNode
  | SpacerNode
  | CustomNode

export type RenderNodeKind = RenderNode['kind']

export type RootNode = {
  kind: 'root'
  backgroundColor?: string
  colorScheme: ColorScheme
  edgeInsets: EdgeInsets
  style: ResolvedStyle
  actions: { onAppear?: ActionRef; onDisappear?: ActionRef }
  children: RenderNode[]
}

export type RenderTree = {
  root: RootNode
  stateStore: StateStore
  actions: Record<string, ActionDefinition>
}
