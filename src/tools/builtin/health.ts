/**
 * Health Summary Tool
 */

import { z } from 'zod';
import type { HealthSummary, HealthSummaryProvider } from '../../services/health.js';
import { defineTool, type RegisteredTool } from '../registry.js';

export const HEALTH_DISABLED_MESSAGE =
  'Health insights are disabled. Enable health integration in Settings to get personalized ADHD recommendations ' +
  'based on your sleep and activity.';

export function formatHealthSummary(summary: HealthSummary): string {
  const sleep = summary.sleepHours === undefined ? 'No sleep data' : `${summary.sleepHours.toFixed(1)} hours`;

  const activityParts: string[] = [];
  if (summary.steps !== undefined) {
    activityParts.push(`${summary.steps} steps`);
  }
  if (summary.activeEnergyKcal !== undefined) {
    activityParts.push(`${Math.round(summary.activeEnergyKcal)} kcal active energy`);
  }
  const activity = activityParts.length > 0 ? activityParts.join(', ') : 'No activity data';

  const lines = ['Health Summary (Last 24 Hours):', '', `Sleep: ${sleep}`, `Activity: ${activity}`];
  if (summary.restingHeartRate !== undefined) {
    lines.push(`Resting heart rate: ${Math.round(summary.restingHeartRate)} bpm`);
  }
  lines.push('', 'This data can help tailor ADHD task recommendations based on your current physical state.');
  return lines.join('\n');
}

export function createHealthTool(health: HealthSummaryProvider): RegisteredTool {
  return defineTool({
    name: 'getHealthSummary',
    description:
      'Gets a basic health summary including sleep and activity data to provide ADHD-specific task recommendations',
    args: z.object({}),
    run: async () => {
      const summary = await health.getSummary();
      return summary === null ? HEALTH_DISABLED_MESSAGE : formatHealthSummary(summary);
    },
  });
}
