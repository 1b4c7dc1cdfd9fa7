/**
 * サーバーサイド専用 Supabase 管理クライアント
 *
 * @description Service Role Key を使用（Storage のバケット書き込みに必要）
 * @warning Service Role Key はシークレットストアから取得し、ログに出さないこと
 *
 * @see https://supabase.com/docs/guides/api/api-keys
 */
import { createClient, type SupabaseClient } from '@supabase/supabase-js';

/**
 * Storage 用クライアントを作成
 *
 * ジョブは1回きりの実行なのでセッション保持・トークン自動更新は無効化する
 *
 * @example
 * ```typescript
 * const client = createStorageClient(config.supabaseUrl, serviceRoleKey);
 * await client.storage.from('ine-api').upload(path, body, { upsert: true });
 * ```
 */
export function createStorageClient(url: string, serviceRoleKey: string): SupabaseClient {
  return createClient(url, serviceRoleKey, {
    auth: {
      persistSession: false,
      autoRefreshToken: false,
    },
  });
}
