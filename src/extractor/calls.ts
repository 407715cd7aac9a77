import type { SyntaxNode } from '../parser/syntax.js';
import { renderText } from '../parser/syntax.js';
import { CALL_SUFFIX, COMMENT_TYPES } from './node-types.js';

/**
 * Text of the callee of a call expression, exactly as written: `player.play`,
 * `super.viewDidLoad`, `setupTableView`. Arguments are not part of it; calls
 * nested in the arguments are separate call expressions met later in the walk.
 */
export function renderCallee(call: SyntaxNode): string | undefined {
  const callee = call.namedChildren.find(
    c => c.type !== CALL_SUFFIX && !COMMENT_TYPES.includes(c.type),
  );
  const text = renderText(callee);
  return text || undefined;
}
