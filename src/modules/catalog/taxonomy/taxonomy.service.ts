import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { ArrayPageQuery } from '../../../shared/array.query.js';
import { getPage, type PaginatedList } from '../../../shared/paginate.js';
import type { PageRequest } from '../../../plugins/pagination.js';
import {
    taxonomyCategorySchema,
    type TaxonomyCategory,
    type TaxonomyCategoryType
} from './taxonomy.schemas.js';

export function loadCategories(file: string): TaxonomyCategory[] {
    const raw: unknown = JSON.parse(fs.readFileSync(path.resolve(file), 'utf8'));
    return z.array(taxonomyCategorySchema).parse(raw);
}

export class TaxonomyService {
    constructor(private readonly categories: TaxonomyCategory[]) {}

    // Categories keep the order of the source file
    async listCategories(
        page: PageRequest,
        filter?: { type?: TaxonomyCategoryType }
    ): Promise<PaginatedList<TaxonomyCategory>> {
        const type = filter?.type;
        const query = new ArrayPageQuery(this.categories, type ? (c) => c.type === type : undefined);
        return getPage(query, page.params, page.links, page.options);
    }
}
