import { debugDump } from '../ir/debugDump'
import type { RenderTree } from '../ir/irTypes'
import type { Renderer } from './types'

export class DebugRenderer implements Renderer<string> {
  render(tree: RenderTree): string {
    return debugDump(tree)
  }
}
