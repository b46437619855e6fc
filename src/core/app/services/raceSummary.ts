import { LAP_STAT_FIELDS, LAP_STAT_LABELS, type LapStat, type RaceContext, type Stroke } from '@core/domain';

import type { RaceAnalysisReport } from './analyzeRace';

const STROKE_LABELS: Record<Stroke, string> = {
  freestyle: 'Freestyle',
  backstroke: 'Backstroke',
  breaststroke: 'Breaststroke',
  butterfly: 'Butterfly',
  im: 'IM',
};

const formatSeconds = (value: number) => value.toFixed(2);

export const formatRaceLabel = (context: RaceContext): string => {
  const event = `${context.distance} ${STROKE_LABELS[context.stroke]}`;
  if (!context.gender) {
    return event;
  }

  const gender = context.gender.charAt(0).toUpperCase() + context.gender.slice(1);
  return `${gender}'s ${event}`;
};

const formatLapLine = (lap: LapStat): string => {
  const parts: string[] = [];

  for (const field of LAP_STAT_FIELDS) {
    const value = lap[field];
    if (typeof value !== 'number') {
      continue;
    }

    const rendered = field === 'strokeCount' ? String(value) : formatSeconds(value);
    parts.push(`${LAP_STAT_LABELS[field]} = ${rendered}`);
  }

  return `  Lap ${lap.lap}: ${parts.join(', ')}`;
};

/**
 * Plain-text rendering of a report, one fact per line.
 */
export const formatRaceSummary = (report: RaceAnalysisReport): string => {
  const { context } = report;
  const lines: string[] = [];

  lines.push(`Swimmer: ${context.swimmer ?? 'Unknown'}`);
  lines.push(`Race: ${formatRaceLabel(context)}${context.relay ? ' (relay)' : ''}`);
  if (context.session) {
    lines.push(`Session: ${context.session}`);
  }

  lines.push('');
  lines.push('Race Metrics:');
  lines.push(`  Total Race Time: ${formatSeconds(report.totalTime)} seconds`);
  if (report.waterEntryTime !== null) {
    lines.push(`  Water Entry Time: ${formatSeconds(report.waterEntryTime)} seconds`);
  }
  report.breakouts.times.forEach((time, index) => {
    lines.push(`  Breakout ${index + 1}: Time = ${formatSeconds(time)} seconds`);
  });
  if (report.breakouts.averageTime !== null) {
    lines.push(`  Avg Breakout Time: ${formatSeconds(report.breakouts.averageTime)} seconds`);
  }
  lines.push(`  Laps: ${report.laps.length}`);

  for (const lap of report.laps) {
    lines.push(formatLapLine(lap));
  }

  const averages = Object.entries(report.overall);
  if (averages.length > 0) {
    lines.push('');
    lines.push('Averages:');
    for (const [name, value] of averages) {
      lines.push(`  ${name}: ${formatSeconds(value)}`);
    }
  }

  lines.push('');
  lines.push(`Total Strokes: ${report.tempo.totalStrokes}`);
  if (report.tempo.averageInterval !== null) {
    lines.push(`Avg Stroke Interval: ${formatSeconds(report.tempo.averageInterval)} seconds`);
  }

  if (report.warnings.length > 0) {
    lines.push('');
    lines.push('Warnings:');
    for (const warning of report.warnings) {
      lines.push(`  - ${warning.message}`);
    }
  }

  return lines.join('\n');
};
