// src/utils/misc/dateUtils.ts

const pad = (value: number, length = 2) => String(value).padStart(length, '0');

/**
 * Formats a date the way EXIF date tags store it, `YYYY:MM:DD HH:MM:SS`, in local time.
 */
export function formatExifDate(date: Date): string {
    const day = `${pad(date.getFullYear(), 4)}:${pad(date.getMonth() + 1)}:${pad(date.getDate())}`;
    const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
    return `${day} ${time}`;
}
