import { emailFieldNames, type EmailCollection } from '../types/email';

export const JSON_MIME_TYPE = 'application/json;charset=utf-8';
export const CSV_MIME_TYPE = 'text/csv;charset=utf-8';

// Absent fields are left out of the JSON rather than written as null.
export const emailsToJson = (emails: EmailCollection): string => JSON.stringify(emails, null, 2);

const escapeCsvCell = (value: string): string =>
  /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;

/** RFC 4180 CSV: header row, one row per email, CRLF line endings. */
export const emailsToCsv = (emails: EmailCollection): string => {
  const rows = [
    emailFieldNames.join(','),
    ...emails.map((email) => emailFieldNames.map((field) => escapeCsvCell(email[field] ?? '')).join(',')),
  ];
  return rows.map((row) => `${row}\r\n`).join('');
};

export const downloadText = (content: string, filename: string, mimeType: string) => {
  const blob = new Blob([content], { type: mimeType });
  const url = URL.createObjectURL(blob);
  const a = document.createElement('a');
  a.href = url;
  a.download = filename;
  a.click();
  URL.revokeObjectURL(url);
};
