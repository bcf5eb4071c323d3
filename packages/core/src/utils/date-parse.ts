/**
 * Date parsing utilities for ledger input and stored cells.
 * All dates returned as UTC (00:00:00Z).
 */

import { InvalidDateError } from '../types/index.js';

/**
 * Parse date value (Excel serial, Date object, or string).
 * Strings may be ISO (YYYY-MM-DD, optionally with a time part) or MM/DD/YYYY.
 * Returns date in UTC (00:00:00Z), or null when the value is not a date.
 */
export function parseDateValue(value: unknown): Date | null {
    if (value instanceof Date) {
        return isValidDate(value) ? value : null;
    }
    if (typeof value === 'number') {
        // Excel serial date
        return Number.isFinite(value) ? excelSerialToDate(value) : null;
    }

    if (typeof value === 'string') {
        const trimmed = value.trim();
        return trimmed.includes('/') ? parseMdyDate(trimmed) : parseIsoDate(trimmed);
    }

    return null;
}

/**
 * Parse a date value into the stored YYYY-MM-DD form.
 * Throws InvalidDateError when the value is not a calendar date.
 */
export function toIsoDate(value: unknown): string {
    const date = parseDateValue(value);
    if (!date) {
        throw new InvalidDateError(value);
    }
    return formatIsoDate(date);
}

/**
 * Parse MM/DD/YYYY date string to Date (UTC).
 */
export function parseMdyDate(value: string): Date | null {
    const match = value.match(/^(\d{1,2})\/(\d{1,2})\/(\d{4})$/);
    if (!match) return null;

    const month = parseInt(match[1]);
    const day = parseInt(match[2]);
    const year = parseInt(match[3]);

    return buildUtcDate(year, month, day);
}

/**
 * Parse YYYY-MM-DD date string to Date (UTC).
 * A trailing time part ("T10:00:00Z", " 00:00:00") is accepted and dropped.
 */
export function parseIsoDate(value: string): Date | null {
    const match = value.match(/^(\d{4})-(\d{2})-(\d{2})(?:[T ][\d:.]+Z?)?$/);
    if (!match) return null;

    const year = parseInt(match[1]);
    const month = parseInt(match[2]);
    const day = parseInt(match[3]);

    return buildUtcDate(year, month, day);
}

function buildUtcDate(year: number, month: number, day: number): Date | null {
    const date = new Date(Date.UTC(year, month - 1, day));
    if (!isValidDate(date)) return null;

    // Date.UTC rolls 2026-02-30 over to March; reject instead.
    if (date.getUTCFullYear() !== year ||
        date.getUTCMonth() !== month - 1 ||
        date.getUTCDate() !== day) {
        return null;
    }

    return date;
}

/**
 * Convert Excel serial date to JavaScript Date (UTC).
 */
export function excelSerialToDate(serial: number): Date {
    // Excel serial: days since 1899-12-30. Round away time-of-day fractions.
    const days = Math.round(serial);
    const utcDays = days - 25569; // Adjust to Unix epoch
    const utcMs = utcDays * 86400 * 1000;
    return new Date(utcMs);
}

/**
 * Format Date as ISO YYYY-MM-DD string (UTC).
 */
export function formatIsoDate(date: Date): string {
    const year = date.getUTCFullYear();
    const month = String(date.getUTCMonth() + 1).padStart(2, '0');
    const day = String(date.getUTCDate()).padStart(2, '0');
    return `${year}-${month}-${day}`;
}

/**
 * Check if date is valid.
 */
export function isValidDate(date: Date): boolean {
    return !isNaN(date.getTime());
}
