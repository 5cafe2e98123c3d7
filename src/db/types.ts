import type { ColumnType } from 'kysely';

export interface PlacesTable {
  id: string;
  name: string;
  city_code: string;
  category: string;
  address: string;
  lat: number;
  lon: number;
  price_tier: 'FREE' | 'CHEAP' | 'MODERATE' | 'EXPENSIVE' | null;
  // Internal columns, never exposed by the API
  source_ref: string | null;
  internal_score: number;
  created_at: ColumnType<Date, Date | string | undefined, never>;
}

export interface Database {
  places: PlacesTable;
}
