import { promises as fs } from 'fs';
import { join } from 'path';
import type { LimitRecord } from '../lib/types.js';

/**
 * 전체 레코드 JSON 저장 (확인용)
 */
export async function saveRecordsJson(
  records: readonly LimitRecord[],
  dir: string,
  filename: string
): Promise<string> {
  await fs.mkdir(dir, { recursive: true });
  const filePath = join(dir, filename);
  await fs.writeFile(filePath, JSON.stringify(records, null, 2), 'utf-8');
  console.log(`[Json] Saved ${records.length} records: ${filePath}`);
  return filePath;
}
