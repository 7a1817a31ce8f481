/**
 * Utility functions for auth service
 */

import crypto from 'node:crypto';

// ═══════════════════════════════════════════════════════════════════
// Token Utilities
// ═══════════════════════════════════════════════════════════════════

/** One-way hash stored in place of a refresh token */
export function hashToken(token: string): string {
  return crypto.createHash('sha256').update(token).digest('hex');
}

// ═══════════════════════════════════════════════════════════════════
// Identifier Utilities
// ═══════════════════════════════════════════════════════════════════

export function normalizeEmail(email: string): string {
  return email.toLowerCase().trim();
}

// ═══════════════════════════════════════════════════════════════════
// Time Utilities
// ═══════════════════════════════════════════════════════════════════

export function addSeconds(date: Date, seconds: number): Date {
  return new Date(date.getTime() + seconds * 1000);
}

export function epochSeconds(date: Date = new Date()): number {
  return Math.floor(date.getTime() / 1000);
}
