import { z } from 'zod'
import type { StateMap, StateValue } from '../state/stateValue'

// JSON AST of a UI document. Decoding the text is the host's job; these schemas
// validate the decoded value and give it a type.

export const JsonValueSchema: z.ZodType<StateValue, z.ZodTypeDef, unknown> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(JsonValueSchema), z.record(JsonValueSchema)]),
)

const StateMapSchema: z.ZodType<StateMap, z.ZodTypeDef, unknown> = z.record(JsonValueSchema)

// --- styles ---

export const DimensionValueSchema = z.union([
  z.number(),
  z.object({ absolute: z.number() }),
  z.object({ fractional: z.number() }),
])
export type DimensionValue = z.infer<typeof DimensionValueSchema>

export const PaddingSchema = z.object({
  top: z.number().optional(),
  bottom: z.number().optional(),
  leading: z.number().optional(),
  trailing: z.number().optional(),
  horizontal: z.number().optional(),
  vertical: z.number().optional(),
})
export type Padding = z.infer<typeof PaddingSchema>

export const ShadowSchema = z.object({
  color: z.string().optional(),
  radius: z.number().optional(),
  x: z.number().optional(),
  y: z.number().optional(),
})
export type Shadow = z.infer<typeof ShadowSchema>

export const FontWeightSchema = z.enum([
  'ultraLight',
  'thin',
  'light',
  'regular',
  'medium',
  'semibold',
  'bold',
  'heavy',
  'black',
])
export type FontWeight = z.infer<typeof FontWeightSchema>

export const TextAlignmentSchema = z.enum(['leading', 'center', 'trailing'])
export type TextAlignment = z.infer<typeof TextAlignmentSchema>

export const StyleSchema = z.object({
  inherits: z.string().optional(),
  fontFamily: z.string().optional(),
  fontSize: z.number().optional(),
  fontWeight: FontWeightSchema.optional(),
  textColor: z.string().optional(),
  textAlignment: TextAlignmentSchema.optional(),
  backgroundColor: z.string().optional(),
  cornerRadius: z.number().optional(),
  borderWidth: z.number().optional(),
  borderColor: z.string().optional(),
  tintColor: z.string().optional(),
  shadow: ShadowSchema.optional(),
  width: DimensionValueSchema.optional(),
  height: DimensionValueSchema.optional(),
  minWidth: DimensionValueSchema.optional(),
  minHeight: DimensionValueSchema.optional(),
  maxWidth: DimensionValueSchema.optional(),
  maxHeight: DimensionValueSchema.optional(),
  padding: PaddingSchema.optional(),
})
export type Style = z.infer<typeof StyleSchema>

// --- actions ---

export type SetStateValue = StateValue | { $expr: string }

export const AlertButtonSchema = z.object({
  label: z.string(),
  style: z.enum(['default', 'cancel', 'destructive']).optional(),
  action: z.string().optional(),
})
export type AlertButton = z.infer<typeof AlertButtonSchema>

export const PresentationSchema = z.enum(['push', 'present', 'fullScreen'])
export type Presentation = z.infer<typeof PresentationSchema>

export type AlertMessage = string | { type: 'static' | 'template'; value: string }

export type DocumentAction =
  | { type: 'dismiss' }
  | { type: 'setState'; path: string; value: SetStateValue }
  | { type: 'toggleState'; path: string }
  | { type: 'showAlert'; title: string; message?: AlertMessage; buttons?: AlertButton[] }
  | { type: 'navigate'; destination: string; presentation?: Presentation }
  | { type: 'sequence'; steps: DocumentAction[] }
  | { type: 'custom'; actionType: string; parameters: StateMap }

const BUILTIN_ACTION_TYPES = new Set(['dismiss', 'setState', 'toggleState', 'showAlert', 'navigate', 'sequence'])

const BuiltinActionSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('dismiss') }),
  z.object({
    type: z.literal('setState'),
    path: z.string().min(1),
    value: z.union([z.object({ $expr: z.string() }).strict(), JsonValueSchema]),
  }),
  z.object({ type: z.literal('toggleState'), path: z.string().min(1) }),
  z.object({
    type: z.literal('showAlert'),
    title: z.string(),
    message: z.union([z.string(), z.object({ type: z.enum(['static', 'template']), value: z.string() })]).optional(),
    buttons: z.array(AlertButtonSchema).optional(),
  }),
  z.object({ type: z.literal('navigate'), destination: z.string(), presentation: PresentationSchema.optional() }),
  z.object({ type: z.literal('sequence'), steps: z.array(z.lazy(() => DocumentActionSchema)) }),
])

// Any other `type` is a custom action; its remaining fields become parameters.
const CustomActionSchema = z
  .object({ type: z.string().min(1) })
  .catchall(JsonValueSchema)
  .refine((a) => !BUILTIN_ACTION_TYPES.has(a.type), { message: 'Malformed built-in action' })
  .transform(({ type, ...parameters }) => ({ type: 'custom' as const, actionType: type, parameters }))

export const DocumentActionSchema: z.ZodType<DocumentAction, z.ZodTypeDef, unknown> = z.lazy(() =>
  z.union([BuiltinActionSchema, CustomActionSchema]),
)

export type ActionBinding = string | DocumentAction

const ActionBindingSchema: z.ZodType<ActionBinding, z.ZodTypeDef, unknown> = z.union([
  z.string(),
  DocumentActionSchema,
])

// --- content ---

export const DataReferenceSchema = z.object({
  type: z.enum(['static', 'binding', 'localBinding']),
  value: z.string().optional(),
  path: z.string().optional(),
  template: z.string().optional(),
})
export type DataReference = z.infer<typeof DataReferenceSchema>

export const DataSourceSchema = z.object({
  type: z.enum(['static', 'binding']),
  value: z.string().optional(),
  path: z.string().optional(),
  template: z.string().optional(),
})
export type DataSource = z.infer<typeof DataSourceSchema>

export const ImageSourceSchema = z.object({
  system: z.string().optional(),
  url: z.string().optional(),
  asset: z.string().optional(),
})
export type ImageSource = z.infer<typeof ImageSourceSchema>

export const GradientStopSchema = z.object({ color: z.string(), location: z.number() })
export type GradientStop = z.infer<typeof GradientStopSchema>

// --- layout tree ---

export const ContainerTypeSchema = z.enum(['vstack', 'hstack', 'zstack'])
export type ContainerType = z.infer<typeof ContainerTypeSchema>

export const AlignmentSchema = z.enum(['leading', 'center', 'trailing', 'top', 'bottom'])
export type Alignment = z.infer<typeof AlignmentSchema>

export type Layout = {
  type: ContainerType
  id?: string
  alignment?: Alignment
  spacing?: number
  padding?: Padding
  styleId?: string
  children: LayoutNode[]
  state?: StateMap
}

export type ForEach = {
  type: 'forEach'
  id?: string
  items: string
  itemVariable?: string
  indexVariable?: string
  layout?: ContainerType
  spacing?: number
  alignment?: Alignment
  padding?: Padding
  template: LayoutNode
  emptyView?: LayoutNode
}

export type Spacer = {
  type: 'spacer'
  minLength?: number
}

export type ColumnConfig = number | { adaptive: { minWidth: number } }

export type SectionLayoutConfig = {
  type: string
  columns?: ColumnConfig
  itemSpacing?: number
  lineSpacing?: number
  contentInsets?: Padding
  showsIndicators?: boolean
  isPagingEnabled?: boolean
  snapBehavior?: 'none' | 'viewAligned' | 'paging'
  showsDividers?: boolean
  alignment?: TextAlignment
}

export type Section = {
  id?: string
  layout: SectionLayoutConfig
  header?: LayoutNode
  footer?: LayoutNode
  stickyHeader?: boolean
  children?: LayoutNode[]
  dataSource?: string
  itemTemplate?: LayoutNode
  itemVariable?: string
}

export type SectionLayout = {
  type: 'sectionLayout'
  id?: string
  sectionSpacing?: number
  sections: Section[]
}

export type Component = {
  type: string
  id?: string
  styleId?: string
  style?: Style
  styles?: { normal?: string; selected?: string; disabled?: string }
  padding?: Padding
  isSelectedBinding?: string
  dataSourceId?: string
  text?: string
  placeholder?: string
  bind?: string
  localBind?: string
  fillWidth?: boolean
  actions?: { onTap?: ActionBinding; onValueChanged?: ActionBinding }
  data?: Record<string, DataReference>
  state?: StateMap
  minValue?: number
  maxValue?: number
  image?: ImageSource
  gradientColors?: GradientStop[]
  gradientStart?: string
  gradientEnd?: string
  props?: StateMap
}

export type LayoutNode = Layout | SectionLayout | ForEach | Spacer | Component

const RESERVED_NODE_TYPES = new Set(['vstack', 'hstack', 'zstack', 'forEach', 'spacer', 'sectionLayout'])

const LayoutSchema = z.object({
  type: ContainerTypeSchema,
  id: z.string().optional(),
  alignment: AlignmentSchema.optional(),
  spacing: z.number().optional(),
  padding: PaddingSchema.optional(),
  styleId: z.string().optional(),
  children: z.array(z.lazy(() => LayoutNodeSchema)),
  state: StateMapSchema.optional(),
})

const ForEachSchema = z.object({
  type: z.literal('forEach'),
  id: z.string().optional(),
  items: z.string().min(1),
  itemVariable: z.string().optional(),
  indexVariable: z.string().optional(),
  layout: ContainerTypeSchema.optional(),
  spacing: z.number().optional(),
  alignment: AlignmentSchema.optional(),
  padding: PaddingSchema.optional(),
  template: z.lazy(() => LayoutNodeSchema),
  emptyView: z.lazy(() => LayoutNodeSchema).optional(),
})

const SpacerSchema = z.object({ type: z.literal('spacer'), minLength: z.number().optional() })

const SectionLayoutConfigSchema = z.object({
  type: z.string().min(1),
  columns: z.union([z.number().int().positive(), z.object({ adaptive: z.object({ minWidth: z.number() }) })]).optional(),
  itemSpacing: z.number().optional(),
  lineSpacing: z.number().optional(),
  contentInsets: PaddingSchema.optional(),
  showsIndicators: z.boolean().optional(),
  isPagingEnabled: z.boolean().optional(),
  snapBehavior: z.enum(['none', 'viewAligned', 'paging']).optional(),
  showsDividers: z.boolean().optional(),
  alignment: TextAlignmentSchema.optional(),
})

const SectionSchema = z.object({
  id: z.string().optional(),
  layout: SectionLayoutConfigSchema,
  header: z.lazy(() => LayoutNodeSchema).optional(),
  footer: z.lazy(() => LayoutNodeSchema).optional(),
  stickyHeader: z.boolean().optional(),
  children: z.array(z.lazy(() => LayoutNodeSchema)).optional(),
  dataSource: z.string().optional(),
  itemTemplate: z.lazy(() => LayoutNodeSchema).optional(),
  itemVariable: z.string().optional(),
})

const SectionLayoutSchema = z.object({
  type: z.literal('sectionLayout'),
  id: z.string().optional(),
  sectionSpacing: z.number().optional(),
  sections: z.array(SectionSchema),
})

const ComponentSchema = z
  .object({
    type: z.string().min(1),
    id: z.string().optional(),
    styleId: z.string().optional(),
    style: StyleSchema.optional(),
    styles: z
      .object({ normal: z.string().optional(), selected: z.string().optional(), disabled: z.string().optional() })
      .optional(),
    padding: PaddingSchema.optional(),
    isSelectedBinding: z.string().optional(),
    dataSourceId: z.string().optional(),
    text: z.string().optional(),
    placeholder: z.string().optional(),
    bind: z.string().optional(),
    localBind: z.string().optional(),
    fillWidth: z.boolean().optional(),
    actions: z.object({ onTap: ActionBindingSchema.optional(), onValueChanged: ActionBindingSchema.optional() }).optional(),
    data: z.record(DataReferenceSchema).optional(),
    state: StateMapSchema.optional(),
    minValue: z.number().optional(),
    maxValue: z.number().optional(),
    image: ImageSourceSchema.optional(),
    gradientColors: z.array(GradientStopSchema).optional(),
    gradientStart: z.string().optional(),
    gradientEnd: z.string().optional(),
    props: StateMapSchema.optional(),
  })
  .refine((c) => !RESERVED_NODE_TYPES.has(c.type), { message: 'Malformed layout node' })

export const LayoutNodeSchema: z.ZodType<LayoutNode, z.ZodTypeDef, unknown> = z.lazy(() =>
  z.union([LayoutSchema, SectionLayoutSchema, ForEachSchema, SpacerSchema, ComponentSchema]),
)

export function isLayout(node: LayoutNode): node is Layout {
  return node.type === 'vstack' || node.type === 'hstack' || node.type === 'zstack'
}

export function isForEach(node: LayoutNode): node is ForEach {
  return node.type === 'forEach'
}

export function isSpacer(node: LayoutNode): node is Spacer {
  return node.type === 'spacer'
}

export function isSectionLayout(node: LayoutNode): node is SectionLayout {
  return node.type === 'sectionLayout'
}

// --- document ---

export const ColorSchemeSchema = z.enum(['light', 'dark', 'system'])
export type ColorScheme = z.infer<typeof ColorSchemeSchema>

export const RootComponentSchema = z.object({
  backgroundColor: z.string().optional(),
  styleId: z.string().optional(),
  colorScheme: ColorSchemeSchema.optional(),
  edgeInsets: PaddingSchema.optional(),
  actions: z.object({ onAppear: ActionBindingSchema.optional(), onDisappear: ActionBindingSchema.optional() }).optional(),
  children: z.array(LayoutNodeSchema),
})
export type RootComponent = z.infer<typeof RootComponentSchema>

export const DocumentSchema = z.object({
  id: z.string().min(1),
  version: z.string().optional(),
  state: StateMapSchema.optional(),
  styles: z.record(StyleSchema).optional(),
  dataSources: z.record(DataSourceSchema).optional(),
  actions: z.record(DocumentActionSchema).optional(),
  root: RootComponentSchema,
})
export type Document = z.infer<typeof DocumentSchema>

export function isProbablyDocument(v: unknown): boolean {
  if (!v || typeof v !== 'object' || Array.isArray(v)) return false
  return 'id' in v && typeof v.id === 'string' && 'root' in v && typeof v.root === 'object' && v.root !== null
}
