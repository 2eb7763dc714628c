/**
 * chalk-based output formatting.
 */

import chalk from 'chalk';
import { Priority, isRegistryError } from '@task-registry/core';
import type { RegistryEvent, Task } from '@task-registry/core';

// --- Formatting functions ---

export function formatCheckbox(completed: boolean): string {
  return completed ? chalk.green('[x]') : chalk.gray('[ ]');
}

export function formatPriority(priority: Priority | null): string {
  switch (priority) {
    case Priority.High: return chalk.red.bold('>>>');
    case Priority.Medium: return chalk.yellow('>> ');
    case Priority.Low: return chalk.blue('>  ');
    default: return chalk.dim('·  ');
  }
}

export function formatTask(task: Task): string {
  if (task.assignedTo === null) return chalk.dim(`    (${task.id}) deleted`);
  const meta = chalk.dim(`  due ${task.dueDate}  @${task.assignedTo}`);
  return `${formatCheckbox(task.completed)} (${task.id}) ${formatPriority(task.priority)} ${task.description}${meta}`;
}

function eventDetail(event: RegistryEvent): string {
  switch (event.type) {
    case 'TaskCreated': {
      const p = event.payload;
      return `#${p.taskId} "${p.description}" due ${p.dueDate} ${p.priority} -> ${p.assignedTo}`;
    }
    case 'TaskCompleted': return `#${event.payload.taskId} by ${event.payload.assignedTo}`;
    case 'TaskDeleted': return `#${event.payload.taskId} by ${event.payload.deletedBy}`;
    case 'TaskReassigned': return `#${event.payload.taskId} ${event.payload.oldAssignee} -> ${event.payload.newAssignee}`;
    case 'TaskUpdated': {
      const p = event.payload;
      return `#${p.taskId} "${p.description}" due ${p.dueDate} ${p.priority}`;
    }
    case 'RegistryPaused':
    case 'RegistryResumed':
      return `by ${event.actor}`;
  }
}

export function formatEvent(event: RegistryEvent): string {
  return `${chalk.cyan(`[${event.timestamp}] ${event.type}`)} ${eventDetail(event)}`;
}

export function formatError(err: unknown): string {
  if (isRegistryError(err)) return `${err.code}: ${err.message}`;
  if (err instanceof Error) return err.message;
  return String(err);
}

// --- Basic output ---

export function success(message: string): void {
  console.log(chalk.green(message));
}

export function error(message: string): void {
  console.log(chalk.red(message));
}

export function warning(message: string): void {
  console.log(chalk.yellow(message));
}

export function info(message: string): void {
  console.log(message);
}

export function event(e: RegistryEvent): void {
  console.log(formatEvent(e));
}
