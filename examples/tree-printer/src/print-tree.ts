import type { IndentingLogger } from "@indentlog/indent-logger"

export type TreeNode = {
  name: string
  size?: number
  children?: TreeNode[]
}

/**
 * Prints one line per node, nesting children one level under their parent.
 */
export function printTree(logger: IndentingLogger, node: TreeNode): void {
  if (node.size === undefined) {
    logger.log("%s/\n", node.name)
  } else {
    logger.log("%s (%d bytes)\n", node.name, node.size)
  }

  const children = node.children ?? []
  if (children.length === 0) return

  logger.group(() => {
    for (const child of children) {
      printTree(logger, child)
    }
  })
}
