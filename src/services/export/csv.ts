import ExcelJS from 'exceljs';
import type { ContactRecord, ResultSet } from '../contact-search/types.js';

const FIXED_COLUMNS = ['contactId', 'initiatedAt', 'queue', 'agent'] as const;

export async function exportResultSetToCsv(resultSet: ResultSet): Promise<Buffer> {
  const workbook = new ExcelJS.Workbook();
  const worksheet = workbook.addWorksheet('Contacts');

  const attributeKeys = collectAttributeKeys(resultSet.records);
  worksheet.columns = [
    ...FIXED_COLUMNS.map(key => ({ header: formatHeader(key), key, width: 24 })),
    ...attributeKeys.map(key => ({ header: key, key: `attr:${key}`, width: 20 })),
  ];

  for (const record of resultSet.records) {
    worksheet.addRow(toRow(record, attributeKeys));
  }

  const buffer = await workbook.csv.writeBuffer();
  return Buffer.from(buffer);
}

function toRow(record: ContactRecord, attributeKeys: string[]): Record<string, string> {
  const row: Record<string, string> = {
    contactId: record.contactId,
    initiatedAt: record.initiatedAt !== undefined ? new Date(record.initiatedAt).toISOString() : '',
    queue: record.queue ?? '',
    agent: record.agent ?? '',
  };
  for (const key of attributeKeys) {
    row[`attr:${key}`] = record.attributes[key] ?? '';
  }
  return row;
}

function collectAttributeKeys(records: readonly ContactRecord[]): string[] {
  const keys = new Set<string>();
  for (const record of records) {
    for (const key of Object.keys(record.attributes)) keys.add(key);
  }
  return Array.from(keys).sort();
}

function formatHeader(key: string): string {
  return key
    .replace(/([A-Z])/g, ' $1')
    .replace(/^./, s => s.toUpperCase())
    .trim();
}
