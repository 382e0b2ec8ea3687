import { z } from 'zod';

/**
 * Raw text fields scraped from one listing card, before parsing
 */
export interface RawListingItem {
  listingId: string;
  ownerType: string;
  transactionType: string;
  priceText: string;
  buildingType: string;
  specText: string;
  tags: string[];
  confirmedDateText: string;
}

/**
 * Zod schema for a normalized listing
 */
export const ListingRecordSchema = z.object({
  listingId: z.string().min(1),
  address: z.string(), // the searched address; results are per searched area
  ownerType: z.string(),
  transactionType: z.string(),
  price: z.number().int().nonnegative(), // won
  buildingType: z.string(),
  areaPyeong: z.number().nonnegative(),
  floorInfo: z.string(),
  direction: z.string(),
  tags: z.array(z.string()),
  updatedDate: z.string(), // YYYY-MM-DD or ''
  detailUrl: z.string(),
  imageUrls: z.array(z.string()),
  description: z.string(),
});

export type ListingRecord = z.infer<typeof ListingRecordSchema>;
