import { ONE_PRICE } from '../config/constants';
import { AssetId, PricingSource } from '../types';
import { UnacceptableParams } from '../core/errors';

/**
 * Price table with a default for unlisted assets. A price of zero marks an
 * asset as non-convertible.
 */
export class TablePricingSource implements PricingSource {
    private readonly prices = new Map<AssetId, bigint>();

    constructor(private readonly defaultPrice: bigint = ONE_PRICE) {
        if (defaultPrice < 0n) {
            throw new UnacceptableParams('default price must be non-negative');
        }
    }

    setPrice(asset: AssetId, price: bigint): void {
        if (price < 0n) {
            throw new UnacceptableParams(`negative price for ${asset}`, { price: price.toString() });
        }
        this.prices.set(asset, price);
    }

    price(asset: AssetId): bigint {
        return this.prices.get(asset) ?? this.defaultPrice;
    }
}
