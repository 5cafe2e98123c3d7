import { getPageMapped, type PaginatedList } from '../../../shared/paginate.js';
import type { PageRequest } from '../../../plugins/pagination.js';
import type { PlaceView } from './place.schemas.js';
import type { PlaceFilter, PlaceRecord, PlaceRepository } from './place.repository.js';

export function toPlaceView(p: PlaceRecord): PlaceView {
    return {
        id: p.id,
        name: p.name,
        cityCode: p.city_code,
        category: p.category,
        address: p.address,
        geo: { lat: p.lat, lon: p.lon },
        priceTier: p.price_tier,
        createdAt: p.created_at.toISOString(),
    };
}

export class PlaceService {
    constructor(private readonly repo: PlaceRepository) {}

    async listPlaces(filter: PlaceFilter, page: PageRequest): Promise<PaginatedList<PlaceView>> {
        return getPageMapped(this.repo.list(filter), page.params, page.links, toPlaceView, page.options);
    }
}
