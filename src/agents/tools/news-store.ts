/**
 * Persistence of news rows.
 *
 * Uniqueness constraints on the `news` table suppress duplicates; the adapter
 * translates the store's errors into an UpsertOutcome so callers never see a
 * thrown error.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { logger, errorMessage } from '../../utils/logger';
import type { NewsRecord, UpsertOutcome } from '../../types/news';

// Postgres unique_violation
export const UNIQUE_VIOLATION_CODE = '23505';
const DUPLICATE_KEY_MESSAGE = 'duplicate key value';

export interface StoreError {
  code?: string;
  message: string;
}

export interface NewsTable {
  upsert(record: NewsRecord): Promise<{ error: StoreError | null }>;
}

/**
 * Bind a Supabase client to the table news rows are written to
 */
export function supabaseNewsTable(client: SupabaseClient, table = 'news'): NewsTable {
  return {
    async upsert(record) {
      const { error } = await client.from(table).upsert(record);
      return { error };
    }
  };
}

export function isDuplicateKeyError(error: StoreError): boolean {
  return error.code === UNIQUE_VIOLATION_CODE || error.message.includes(DUPLICATE_KEY_MESSAGE);
}

export async function upsertNewsRecord(table: NewsTable, record: NewsRecord): Promise<UpsertOutcome> {
  try {
    const { error } = await table.upsert(record);

    if (!error) {
      logger.info("Upserted article into 'news' table", { url: record.news_url });
      return 'success';
    }

    if (isDuplicateKeyError(error)) {
      logger.info('Duplicate detected (unique constraint). Skipping this article.', { url: record.news_url });
      return 'duplicate';
    }

    logger.error(`Upsert failed with API error: ${error.message}. Skipping this article.`, error);
    return 'failed';
  } catch (error) {
    logger.error(`Upsert failed with unexpected error: ${errorMessage(error)}. Skipping this article.`, error);
    return 'failed';
  }
}
