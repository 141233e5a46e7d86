/**
 * chalk-based console output for the CLI commands.
 */

import chalk from 'chalk';
import { TaskStatus, TaskStatusName, Priority, PriorityName } from '@taskapi/core';

export function formatStatus(status: TaskStatus, count: number): string {
  const label = `${count} ${TaskStatusName[status].toLowerCase()}`;
  if (count === 0) return chalk.dim(label);
  switch (status) {
    case TaskStatus.Completed: return chalk.green(label);
    case TaskStatus.InProgress: return chalk.yellow(label);
    default: return chalk.gray(label);
  }
}

export function formatPriority(priority: Priority, count: number): string {
  const label = `${count} ${PriorityName[priority].toLowerCase()}`;
  if (count === 0) return chalk.dim(label);
  switch (priority) {
    case Priority.High: return chalk.red.bold(label);
    case Priority.Medium: return chalk.yellow(label);
    default: return chalk.blue(label);
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
