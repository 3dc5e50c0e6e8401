/**
 * chalk-based output formatting.
 */

import chalk from 'chalk';
import { Priority, describeNotFound } from '@sortbox/core';
import type { Result, Task } from '@sortbox/core';

// --- Formatting functions ---

export function formatCheckbox(completed: boolean): string {
  return completed ? chalk.green('[x]') : chalk.gray('[ ]');
}

export function formatPriority(priority: Priority): string {
  switch (priority) {
    case Priority.High: return chalk.red.bold('>>>');
    case Priority.Medium: return chalk.yellow('>> ');
    case Priority.Low: return chalk.blue('>  ');
  }
}

export function formatTimestamp(iso: string): string {
  return new Date(iso).toLocaleString('en-US', {
    weekday: 'short',
    month: 'short',
    day: 'numeric',
    hour: '2-digit',
    minute: '2-digit',
    hour12: false,
  });
}

export function formatReminder(reminder: string | null): string {
  if (!reminder) return '';
  return chalk.dim(`  Reminder: ${formatTimestamp(reminder)}`);
}

export function formatTaskLine(task: Task): string {
  const title = task.completed ? chalk.dim.strikethrough(task.title) : chalk.bold(task.title);
  return `${chalk.dim(task.id)} ${formatCheckbox(task.completed)} ${formatPriority(task.priority)} ${title}${formatReminder(task.reminder)}`;
}

export function formatCount(taskCount: number, completedCount: number): string {
  const tasks = taskCount === 1 ? '1 task' : `${taskCount} tasks`;
  return completedCount > 0 ? `${tasks}, ${completedCount} done` : tasks;
}

// --- Result output ---

/** Print a success line built from the result's data, or the not-found error */
export function printResult<T>(result: Result<T>, message: (data: T) => string): void {
  switch (result.type) {
    case 'success': success(message(result.data)); break;
    case 'not-found': error(describeNotFound(result)); break;
  }
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

export function debug(message: string): void {
  console.log(chalk.dim(`[debug] ${message}`));
}
