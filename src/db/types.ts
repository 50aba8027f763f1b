import type { Selectable } from "kysely";

// ============================================================================
// Funnel tables present in every bot database
// ============================================================================

export interface FunnelHistoryTable {
  user_id: number;
  label: string;
  datetime: Date;
}

export interface UserFunnelTable {
  user_id: number;
  label: string;
  datetime: Date | null;
}

export interface SourceDatabase {
  funnel_history: FunnelHistoryTable;
  user_funnel: UserFunnelTable;
}

export type FunnelHistoryRow = Selectable<FunnelHistoryTable>;
export type UserFunnelRow = Selectable<UserFunnelTable>;

// ============================================================================
// Standard users query
// ============================================================================

export const STANDARD_QUERY = `
  SELECT id, username, first_name, last_name,
         DATE(timestamp_registration) AS date_registration,
         CASE WHEN user_block THEN 'Да' ELSE 'Нет' END AS user_block,
         source, campaign, content, medium, term, raw_link
  FROM users
  LEFT JOIN lead_resources ON users.id = lead_resources.user_id
`;
