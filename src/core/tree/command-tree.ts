/**
 * Command tree: internal nodes are command tokens, leaves hold the
 * specification of one command function.
 *
 * A tree is assembled with a {@link CommandTreeBuilder} and is immutable
 * once built.
 */
import { ErrorCodes, SpecificationError } from '../../utils/errors.js';
import type { FunctionSpec } from '../spec/types.js';

interface MutableNode {
  readonly children: Map<string, MutableNode>;
  spec?: FunctionSpec;
}

interface TreeNode {
  readonly children: ReadonlyMap<string, TreeNode>;
  readonly spec?: FunctionSpec;
}

export interface WalkEntry {
  readonly path: readonly string[];
  /** Child tokens in alphabetical order; empty for a leaf. */
  readonly children: readonly string[];
  readonly spec?: FunctionSpec;
}

export class CommandTreeBuilder {
  private readonly root: MutableNode = { children: new Map() };
  private built = false;

  /**
   * Insert a specification at a command path.
   *
   * @throws SpecificationError when the path is taken, passes through a
   *   leaf, or ends on an internal node.
   */
  insert(path: readonly string[], spec: FunctionSpec): this {
    if (this.built) {
      throw new Error('command tree has already been built');
    }
    if (path.length === 0) {
      throw new SpecificationError(ErrorCodes.INVALID_COMMAND_NAME, 'command path must not be empty');
    }

    let node = this.root;
    path.forEach((token, depth) => {
      if (node.spec) {
        throw new SpecificationError(
          ErrorCodes.COMMAND_PATH_CONFLICT,
          `${spec.name}: command ${path.slice(0, depth).join(' ')} is a terminal command (${node.spec.name})`,
          { function: spec.name, conflictsWith: node.spec.name }
        );
      }
      let child = node.children.get(token);
      if (!child) {
        child = { children: new Map() };
        node.children.set(token, child);
      }
      node = child;
    });

    if (node.spec) {
      throw new SpecificationError(
        ErrorCodes.DUPLICATE_COMMAND,
        `${spec.name}: command ${path.join(' ')} is already defined by ${node.spec.name}`,
        { function: spec.name, conflictsWith: node.spec.name }
      );
    }
    if (node.children.size > 0) {
      throw new SpecificationError(
        ErrorCodes.COMMAND_PATH_CONFLICT,
        `${spec.name}: command ${path.join(' ')} already has subcommands`,
        { function: spec.name }
      );
    }
    node.spec = spec;
    return this;
  }

  build(): CommandTree {
    this.built = true;
    return new CommandTree(freezeNode(this.root));
  }
}

function freezeNode(node: MutableNode): TreeNode {
  const children = new Map<string, TreeNode>();
  for (const token of [...node.children.keys()].sort()) {
    const child = node.children.get(token);
    if (child) children.set(token, freezeNode(child));
  }
  return Object.freeze({ children, ...(node.spec ? { spec: node.spec } : {}) });
}

export class CommandTree {
  /** @internal use {@link CommandTree.builder} */
  constructor(private readonly root: TreeNode) {}

  static builder(): CommandTreeBuilder {
    return new CommandTreeBuilder();
  }

  /**
   * Depth-first walk from the root, children in alphabetical order.
   * The root itself is yielded first with an empty path.
   */
  *walk(): Generator<WalkEntry> {
    const visited = new Set<TreeNode>();
    const stack: Array<{ path: readonly string[]; node: TreeNode }> = [{ path: [], node: this.root }];

    while (stack.length > 0) {
      const entry = stack.pop();
      if (!entry) break;
      const { path, node } = entry;
      // shared subtrees are yielded once, at their first path
      if (visited.has(node)) continue;
      visited.add(node);

      const children = [...node.children.keys()];
      yield { path, children, ...(node.spec ? { spec: node.spec } : {}) };

      for (const token of [...children].reverse()) {
        const child = node.children.get(token);
        if (child) stack.push({ path: [...path, token], node: child });
      }
    }
  }

  /**
   * Specification at a command path, if that path is a leaf.
   */
  lookup(path: readonly string[]): FunctionSpec | undefined {
    return this.find(path)?.spec;
  }

  /**
   * Whether a path names an existing node, internal or leaf.
   */
  has(path: readonly string[]): boolean {
    return this.find(path) !== undefined;
  }

  /**
   * Leaf specifications under a path, in walk order.
   */
  leaves(prefix: readonly string[] = []): FunctionSpec[] {
    const specs: FunctionSpec[] = [];
    for (const entry of this.walk()) {
      if (entry.spec && prefix.every((token, index) => entry.path[index] === token)) {
        specs.push(entry.spec);
      }
    }
    return specs;
  }

  get size(): number {
    return this.leaves().length;
  }

  private find(path: readonly string[]): TreeNode | undefined {
    let node: TreeNode | undefined = this.root;
    for (const token of path) {
      node = node.children.get(token);
      if (!node) return undefined;
    }
    return node;
  }
}
