import type { CodeEntity, MethodInfo } from '../model/entity.js';
import type { GraphStore } from '../graph/store.js';
import type { SyntaxNode, SyntaxTree } from '../parser/syntax.js';
import { declarationKind, makeEntity } from './entity-builder.js';
import { makeMethod } from './signature.js';
import { parseProperties } from './properties.js';
import { renderCallee } from './calls.js';
import { CALL_EXPRESSION, FUNCTION_DECLARATIONS, MEMBER_BODIES, PROPERTY_DECLARATIONS } from './node-types.js';

/**
 * How the walk attributes members and calls to declarations.
 *
 * - `scoped`: a stack of open declarations. Members belong to the innermost
 *   open type when declared directly in it, never inside an initializer,
 *   accessor or closure body; calls belong to the innermost open method.
 *   Leaving a nested declaration restores the outer one.
 * - `flat`: one slot for the current type and one for the current method.
 *   Leaving any type or function empties its slot, so members declared after a
 *   nested type are dropped, and locals inside methods are recorded as members.
 */
export type ContextMode = 'scoped' | 'flat';

export const CONTEXT_MODES: readonly ContextMode[] = ['scoped', 'flat'];

export interface CollectOptions {
  context?: ContextMode;
}

interface DeclarationContext {
  openEntity(entity: CodeEntity): void;
  closeEntity(): void;
  /** Entity a member declared at the current position belongs to */
  memberOwner(): CodeEntity | undefined;
  openMethod(owner: CodeEntity, method: MethodInfo): void;
  closeMethod(opened: boolean): void;
  /** Code body that is not itself a member (initializer, accessor, closure) */
  openBody(): void;
  closeBody(): void;
  /** Method a call at the current position is recorded on */
  callTarget(): MethodInfo | undefined;
}

interface Frame {
  entity?: CodeEntity;
  method?: MethodInfo;
  /** Declarations in here are locals */
  opaque?: boolean;
}

class ScopedContext implements DeclarationContext {
  private frames: Frame[] = [];

  private top(): Frame | undefined {
    return this.frames[this.frames.length - 1];
  }

  openEntity(entity: CodeEntity): void {
    this.frames.push({ entity });
  }

  closeEntity(): void {
    this.frames.pop();
  }

  memberOwner(): CodeEntity | undefined {
    const top = this.top();
    return top && !top.method && !top.opaque ? top.entity : undefined;
  }

  openMethod(owner: CodeEntity, method: MethodInfo): void {
    this.frames.push({ entity: owner, method });
  }

  closeMethod(opened: boolean): void {
    if (opened) this.frames.pop();
  }

  openBody(): void {
    const top = this.top();
    // a closure inside a method still reports its calls to that method
    this.frames.push({ entity: top?.entity, method: top?.method, opaque: true });
  }

  closeBody(): void {
    this.frames.pop();
  }

  callTarget(): MethodInfo | undefined {
    return this.top()?.method;
  }
}

class FlatContext implements DeclarationContext {
  private entityName: string | undefined;
  private methodIndex: number | undefined;

  constructor(private readonly store: GraphStore) {}

  openEntity(entity: CodeEntity): void {
    this.entityName = entity.name;
  }

  closeEntity(): void {
    this.entityName = undefined;
  }

  memberOwner(): CodeEntity | undefined {
    return this.entityName === undefined ? undefined : this.store.get(this.entityName);
  }

  openMethod(owner: CodeEntity, method: MethodInfo): void {
    this.methodIndex = owner.methods.indexOf(method);
  }

  closeMethod(): void {
    this.methodIndex = undefined;
  }

  // one slot per kind, so bodies leave no trace
  openBody(): void {}

  closeBody(): void {}

  callTarget(): MethodInfo | undefined {
    const owner = this.memberOwner();
    if (!owner || this.methodIndex === undefined) return undefined;
    // a nested type can be current while the index still points into its parent
    return owner.methods[this.methodIndex];
  }
}

/**
 * Walk one file's syntax tree and record its entities into `store`.
 * Entities are registered as soon as their declaration is entered.
 */
export function collectDependencies(
  tree: SyntaxTree,
  store: GraphStore,
  options: CollectOptions = {},
): void {
  const context: DeclarationContext = options.context === 'flat'
    ? new FlatContext(store)
    : new ScopedContext();
  visitNode(tree.rootNode, store, context);
}

function visitNode(node: SyntaxNode, store: GraphStore, context: DeclarationContext): void {
  let openedEntity = false;
  let openedMethod = false;
  const isFunction = FUNCTION_DECLARATIONS.includes(node.type);
  const isBody = MEMBER_BODIES.includes(node.type);

  if (declarationKind(node)) {
    const entity = makeEntity(node);
    if (entity) {
      context.openEntity(store.register(entity));
      openedEntity = true;
    }
  } else if (PROPERTY_DECLARATIONS.includes(node.type)) {
    context.memberOwner()?.properties.push(...parseProperties(node));
  } else if (isFunction) {
    const owner = context.memberOwner();
    const method = owner ? makeMethod(node) : undefined;
    if (owner && method) {
      owner.methods.push(method);
      context.openMethod(owner, method);
      openedMethod = true;
    }
  } else if (node.type === CALL_EXPRESSION) {
    const target = context.callTarget();
    const callee = target ? renderCallee(node) : undefined;
    if (target && callee) target.calls.push(callee);
  }

  if (isBody) context.openBody();

  for (const child of node.namedChildren) {
    visitNode(child, store, context);
  }

  if (isBody) context.closeBody();
  if (isFunction) context.closeMethod(openedMethod);
  if (openedEntity) context.closeEntity();
}
