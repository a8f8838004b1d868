/**
 * Clock tool - reports the local date and time
 */

import { z } from 'zod';
import type { Tool, ToolResult } from '../core/models.js';
import { ToolUseCountMetadata } from '../core/models.js';

const pad = (value: number): string => String(value).padStart(2, '0');

/**
 * Format a date in local time as `YYYY-MM-DD HH:MM:SS`
 */
export function formatLocalTimestamp(date: Date): string {
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
  return `${day} ${time}`;
}

/** The tool takes no arguments */
export const CurrentTimeParamsSchema = z.object({});

export const CURRENT_TIME_TOOL: Tool<typeof CurrentTimeParamsSchema, ToolUseCountMetadata> = {
  name: 'get_current_time',
  description: 'Get the current time and date.',
  parameters: CurrentTimeParamsSchema,
  executor: (): ToolResult<ToolUseCountMetadata> => ({
    content: formatLocalTimestamp(new Date()),
    metadata: new ToolUseCountMetadata(1),
  }),
};
