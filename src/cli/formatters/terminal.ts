import chalk from 'chalk';
import type { CodeEntity, EntityKind, MethodInfo, ParameterInfo } from '../../model/entity.js';
import { compareNames } from '../../graph/store.js';

const KIND_COLORS: Record<EntityKind, (text: string) => string> = {
  class: chalk.blue,
  struct: chalk.green,
  enum: chalk.magenta,
  protocol: chalk.cyan,
  extension: chalk.yellow,
};

export interface TerminalSummary {
  fileCount: number;
  failedCount: number;
}

export function formatTerminal(entities: Iterable<CodeEntity>, summary: TerminalSummary): string {
  const sorted = [...entities].sort((a, b) => compareNames(a.name, b.name));
  if (sorted.length === 0) {
    return chalk.dim('No entities found.');
  }

  const lines: string[] = [];

  for (const entity of sorted) {
    const header = `─ ${entity.kind} ${entity.name} `;
    const padLen = Math.max(0, 55 - header.length);
    lines.push(chalk.dim('┌─ ') + KIND_COLORS[entity.kind](entity.kind) + ' ' + chalk.bold(entity.name) + ' ' + chalk.dim('─'.repeat(padLen)));

    if (entity.inheritedTypes.length > 0) {
      lines.push(chalk.dim('│  inherits?  ') + entity.inheritedTypes.join(', '));
    }
    if (entity.conformedProtocols.length > 0) {
      lines.push(chalk.dim('│  conforms?  ') + entity.conformedProtocols.join(', '));
    }
    for (const prop of entity.properties) {
      lines.push(chalk.dim('│  ') + `${prop.name}: ${chalk.dim(prop.type)}`);
    }
    for (const method of entity.methods) {
      lines.push(chalk.dim('│  ') + formatSignature(method));
      if (method.calls.length > 0) {
        lines.push(chalk.dim('│      → ') + method.calls.join(chalk.dim(', ')));
      }
    }

    lines.push(chalk.dim('└' + '─'.repeat(55)));
  }

  lines.push('');

  const counts = new Map<EntityKind, number>();
  for (const e of sorted) {
    counts.set(e.kind, (counts.get(e.kind) ?? 0) + 1);
  }
  const kinds = [...counts].map(([kind, n]) => KIND_COLORS[kind](`${n} ${kind}${n !== 1 ? 's' : ''}`));
  const methodCount = sorted.reduce((n, e) => n + e.methods.length, 0);

  lines.push(
    `Summary: ${sorted.length} entit${sorted.length !== 1 ? 'ies' : 'y'} (${kinds.join(', ')}), ` +
    `${methodCount} method${methodCount !== 1 ? 's' : ''} across ${summary.fileCount} file${summary.fileCount !== 1 ? 's' : ''}`,
  );
  if (summary.failedCount > 0) {
    lines.push(chalk.red(`${summary.failedCount} file${summary.failedCount !== 1 ? 's' : ''} skipped`));
  }
  lines.push(chalk.dim('inherits?/conforms? split the inheritance clause by position and are approximate'));

  return lines.join('\n');
}

export function formatSignature(method: MethodInfo): string {
  const params = method.parameters.map(formatParameter).join(', ');
  const returns = method.returnType !== undefined ? ` -> ${method.returnType}` : '';
  return `func ${method.name}(${params})${returns}`;
}

function formatParameter(param: ParameterInfo): string {
  const label = param.externalName !== undefined ? `${param.externalName} ` : '';
  const type = param.type !== undefined ? `: ${param.type}` : '';
  return `${label}${param.internalName}${type}`;
}
