import type { RenderTree } from '../ir/irTypes'

/** Turns a resolved render tree into some host output. */
export type Renderer<TOutput> = {
  render: (tree: RenderTree) => TOutput
}
