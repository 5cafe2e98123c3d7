import fs from 'node:fs';
import path from 'node:path';
import type { Kysely, Selectable } from 'kysely';
import { z } from 'zod';
import type { Database, PlacesTable } from '../../../db/types.js';
import type { PageQuery } from '../../../shared/paginate.js';
import { ArrayPageQuery } from '../../../shared/array.query.js';
import { PlaceFixtureSchema } from './place.schemas.js';

export type PlaceRecord = Selectable<PlacesTable>;

export type PlaceFilter = {
    cityCode?: string;
    category?: string;
};

export interface PlaceRepository {
    // Places matching the filter, oldest first
    list(filter: PlaceFilter): PageQuery<PlaceRecord>;
}

export class KyselyPlaceRepository implements PlaceRepository {
    constructor(private readonly db: Kysely<Database>) {}

    list(filter: PlaceFilter): PageQuery<PlaceRecord> {
        const base = () => {
            let q = this.db.selectFrom('places');
            if (filter.cityCode) q = q.where('city_code', '=', filter.cityCode);
            if (filter.category) q = q.where('category', '=', filter.category);
            return q;
        };
        return {
            count: async () => {
                const row = await base()
                    .select((eb) => eb.fn.countAll<string>().as('total'))
                    .executeTakeFirstOrThrow();
                // pg returns bigint counts as strings
                return Number(row.total);
            },
            fetch: (offset, limit) =>
                base()
                    .selectAll()
                    .orderBy('created_at', 'asc')
                    .orderBy('id', 'asc')
                    .limit(limit)
                    .offset(offset)
                    .execute(),
        };
    }
}

export class InMemoryPlaceRepository implements PlaceRepository {
    private readonly rows: PlaceRecord[];

    constructor(rows: PlaceRecord[]) {
        this.rows = [...rows].sort(
            (a, b) => a.created_at.getTime() - b.created_at.getTime() || a.id.localeCompare(b.id)
        );
    }

    list(filter: PlaceFilter): PageQuery<PlaceRecord> {
        return new ArrayPageQuery(this.rows, (p) =>
            (!filter.cityCode || p.city_code === filter.cityCode) &&
            (!filter.category || p.category === filter.category)
        );
    }
}

export function loadPlaceFixtures(file: string): PlaceRecord[] {
    const raw: unknown = JSON.parse(fs.readFileSync(path.resolve(file), 'utf8'));
    return z.array(PlaceFixtureSchema).parse(raw).map((p) => ({ ...p, created_at: new Date(p.created_at) }));
}
