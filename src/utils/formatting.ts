/**
 * Reply and notification text
 */

import type { AppointmentSlot, GlobalStats, UserStats } from '../types/index.js';

const UNSAFE_CHARACTERS = /[<>"'&;|`$()]/g;

/**
 * Strip characters that could break out of Markdown or a shell-like context.
 */
export function sanitizeInput(text: string): string {
  return text.replace(UNSAFE_CHARACTERS, '').trim();
}

/**
 * Telegram-flavoured Markdown list of slots.
 *
 * @param centerName maps a centre id to its display name
 */
export function formatAppointmentMessage(
  slots: readonly AppointmentSlot[],
  centerName: (center: string) => string = (center) => center
): string {
  if (slots.length === 0) {
    return 'No appointments found.';
  }

  const blocks = slots.map((slot, index) => {
    const lines = [
      `*${index + 1}. ${centerName(slot.center)}*`,
      `Date: ${slot.date}`,
      `Time: ${slot.time}`,
      `Test type: ${slot.testType}`,
    ];
    if (slot.bookingUrl) {
      lines.push(`[Book now](${slot.bookingUrl})`);
    }
    return lines.join('\n');
  });

  return ['*Appointments available!*', ...blocks].join('\n\n');
}

/**
 * @example formatDuration(135) // '2 hours 15 minutes'
 */
export function formatDuration(minutes: number): string {
  if (minutes < 60) {
    return `${minutes} minutes`;
  }
  if (minutes < 1440) {
    const hours = Math.floor(minutes / 60);
    const rest = minutes % 60;
    return rest === 0 ? `${hours} hours` : `${hours} hours ${rest} minutes`;
  }
  const days = Math.floor(minutes / 1440);
  const hours = Math.floor((minutes % 1440) / 60);
  return hours === 0 ? `${days} days` : `${days} days ${hours} hours`;
}

export function formatUserStats(stats: UserStats | null): string {
  if (!stats) {
    return 'No statistics available.';
  }
  return [
    '*Your statistics*',
    `Sessions: ${stats.sessions}`,
    `Total checks: ${stats.totalChecks}`,
    `Failed checks: ${stats.failedChecks}`,
    ...(stats.lastFailure ? [`Last failure: ${stats.lastFailure.at} (${stats.lastFailure.message})`] : []),
    `Appointments found: ${stats.appointmentsFound}`,
    `Last activity: ${stats.lastActivity ?? 'never'}`,
    `Recent activity: ${stats.recentChecks} checks in the last 7 days`,
  ].join('\n');
}

export function formatGlobalStats(stats: GlobalStats): string {
  return [
    '*Global statistics*',
    `Active users: ${stats.totalUsers}`,
    `Appointments found today: ${stats.appointmentsToday}`,
    `Active monitors: ${stats.activeSessions}`,
  ].join('\n');
}
