import chalk from 'chalk';
import type { MutationResult, Priority, TaskNode, ListSummary } from '@tasktree/core';

export function success(message: string): void {
  console.log(chalk.green(message));
}

export function error(message: string): void {
  console.error(chalk.red(message));
}

export function warning(message: string): void {
  console.log(chalk.yellow(message));
}

export function info(message: string): void {
  console.log(message);
}

/** Print any mutation result; an error also marks the process as failed */
export function printResult<T>(result: MutationResult<T>): void {
  switch (result.type) {
    case 'success':
      success(result.message);
      break;
    case 'no-change':
      warning(result.message);
      break;
    case 'error':
      error(result.error.message);
      process.exitCode = 1;
      break;
  }
}

export function formatCheckbox(completed: boolean): string {
  return completed ? chalk.green('[x]') : chalk.dim('[ ]');
}

export function formatPriority(priority: Priority): string {
  switch (priority) {
    case 'high': return chalk.red('!!!');
    case 'medium': return chalk.yellow(' !!');
    case 'low': return chalk.blue('  !');
  }
}

export function truncate(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max - 1)}…` : text;
}

/** One line for a task, indented by depth */
export function formatTaskLine(node: TaskNode): string {
  const indent = '  '.repeat(node.depth - 1);
  const title = node.completed ? chalk.dim(node.title) : chalk.bold(node.title);
  const hidden = node.collapsed && node.subtaskCount > 0
    ? chalk.dim(` ▸ ${node.subtaskCount} hidden`)
    : '';
  return `${indent}${formatCheckbox(node.completed)} ${formatPriority(node.priority)} ${chalk.dim(`(${node.id})`)} ${title}${hidden}`;
}

/** Lines for a forest of tasks; children of collapsed tasks are skipped */
export function renderTree(nodes: readonly TaskNode[]): string[] {
  const lines: string[] = [];
  const stack = [...nodes].reverse();

  for (let node = stack.pop(); node; node = stack.pop()) {
    lines.push(formatTaskLine(node));

    const firstLine = node.description.split('\n').find(l => l.trim().length > 0);
    if (firstLine) {
      lines.push(`${'  '.repeat(node.depth)}      ${chalk.dim(truncate(firstLine.trim(), 60))}`);
    }

    if (!node.collapsed) stack.push(...[...node.subtasks].reverse());
  }

  return lines;
}

export function formatListSummary(list: ListSummary, isDefault: boolean): string {
  const counts = chalk.dim(`${list.completedCount}/${list.taskCount} done`);
  const name = isDefault ? chalk.bold(`${list.name} (default)`) : list.name;
  return `${chalk.dim(`(${list.id})`)} ${name} ${counts}`;
}
