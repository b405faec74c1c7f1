interface TreeNode {
  readonly children: Map<string, TreeNode>;
  isDirectory: boolean;
}

function createNode(): TreeNode {
  return { children: new Map(), isDirectory: false };
}

function insert(root: TreeNode, path: string): void {
  const segments = path.split('/').filter((s) => s.length > 0);
  const trailingSlash = path.endsWith('/');
  let node = root;

  segments.forEach((segment, index) => {
    let child = node.children.get(segment);
    if (!child) {
      child = createNode();
      node.children.set(segment, child);
    }
    const isLast = index === segments.length - 1;
    if (!isLast || trailingSlash) {
      child.isDirectory = true;
    }
    node = child;
  });
}

function sortedEntries(node: TreeNode): [string, TreeNode][] {
  return [...node.children.entries()].sort(([nameA, a], [nameB, b]) => {
    if (a.isDirectory !== b.isDirectory) return a.isDirectory ? -1 : 1;
    return nameA < nameB ? -1 : nameA > nameB ? 1 : 0;
  });
}

function render(node: TreeNode, prefix: string, lines: string[]): void {
  const entries = sortedEntries(node);
  entries.forEach(([name, child], index) => {
    const isLast = index === entries.length - 1;
    const connector = isLast ? '└── ' : '├── ';
    lines.push(`${prefix}${connector}${name}${child.isDirectory ? '/' : ''}`);
    if (child.isDirectory) {
      render(child, prefix + (isLast ? '    ' : '│   '), lines);
    }
  });
}

/**
 * Renders slash-separated paths as a box-drawing tree.
 * Directories sort before files; a path ending in `/` is an (possibly empty) directory.
 */
export function formatTree(paths: readonly string[]): string[] {
  const root = createNode();
  for (const path of paths) {
    insert(root, path);
  }
  const lines: string[] = [];
  render(root, '', lines);
  return lines;
}
