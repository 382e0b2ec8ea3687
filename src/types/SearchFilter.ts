import { z, type ZodIssue } from 'zod';

/**
 * Transaction types, valued by the labels the listings site shows
 */
export enum TransactionType {
  SALE = '매매',
  LEASE = '전세',
  MONTHLY_RENT = '월세',
  SHORT_TERM = '단기임대',
}

/**
 * The 18 building categories offered by the site's filter panel
 */
export enum BuildingType {
  APARTMENT = '아파트',
  OFFICETEL = '오피스텔',
  VILLA = '빌라',
  APARTMENT_PRESALE = '아파트분양권',
  OFFICETEL_PRESALE = '오피스텔분양권',
  RECONSTRUCTION = '재건축',
  COUNTRY_HOUSE = '전원주택',
  DETACHED_MULTI_FAMILY = '단독/다가구',
  SHOP_HOUSE = '상가주택',
  HANOK = '한옥주택',
  REDEVELOPMENT = '재개발',
  STUDIO = '원룸',
  RETAIL = '상가',
  OFFICE = '사무실',
  FACTORY_WAREHOUSE = '공장/창고',
  BUILDING = '건물',
  LAND = '토지',
  KNOWLEDGE_INDUSTRY_CENTER = '지식산업센터',
}

/**
 * Floor-area buckets in pyeong
 */
export enum AreaBucket {
  UNDER_10 = '~ 10평',
  FROM_10 = '10평대',
  FROM_20 = '20평대',
  FROM_30 = '30평대',
  FROM_40 = '40평대',
  FROM_50 = '50평대',
  FROM_60 = '60평대',
  OVER_70 = '70평 ~',
}

/**
 * Address needs a province-level and a district-level token, e.g. "서울시 강남구"
 */
export function hasProvinceAndDistrict(address: string): boolean {
  return address.trim().split(/\s+/).filter(Boolean).length >= 2;
}

function unique<T>(values: T[]): T[] {
  return [...new Set(values)];
}

export const NumericRangeSchema = z
  .object({
    min: z.number().int().nonnegative().optional(),
    max: z.number().int().nonnegative().optional(),
  })
  .refine((range) => range.min !== undefined || range.max !== undefined, {
    message: 'Range needs at least one bound',
  })
  .refine(
    (range) => range.min === undefined || range.max === undefined || range.min <= range.max,
    { message: 'Range minimum must not exceed its maximum' }
  );

export type NumericRange = z.infer<typeof NumericRangeSchema>;

/**
 * Schema for the crawler's input filter. Amounts are in won.
 */
export const SearchFilterSchema = z.object({
  address: z
    .string()
    .trim()
    .min(1, 'Address is required')
    .refine(hasProvinceAndDistrict, {
      message: 'Address needs at least a province and a district token',
    }),
  transactionTypes: z
    .array(z.nativeEnum(TransactionType))
    .min(1, 'At least one transaction type is required')
    .transform(unique),
  buildingTypes: z
    .array(z.nativeEnum(BuildingType))
    .min(1, 'At least one building type is required')
    .transform(unique),
  salePriceRange: NumericRangeSchema.optional(),
  depositRange: NumericRangeSchema.optional(),
  monthlyRentRange: NumericRangeSchema.optional(),
  areaBucket: z.nativeEnum(AreaBucket).optional(),
});

export type SearchFilter = z.infer<typeof SearchFilterSchema>;

/** A filter as callers write it, before trimming and de-duplication */
export type SearchFilterInput = z.input<typeof SearchFilterSchema>;

const PriceBoundsSchema = z
  .array(z.number().int().nonnegative())
  .min(1)
  .max(2)
  .refine((bounds) => bounds.length < 2 || bounds[0] <= bounds[1], {
    message: 'First value (minimum) must not exceed the second (maximum)',
  })
  .nullable()
  .optional();

/**
 * Schema for the keyword object produced by the natural-language extraction step.
 * Price arrays are `[max]` or `[min, max]`.
 */
export const KeywordFilterSchema = z.object({
  address: z
    .string()
    .min(1, 'address is required')
    .refine(hasProvinceAndDistrict, {
      message: 'address needs at least a province and a district token',
    }),
  transaction_type: z.array(z.nativeEnum(TransactionType)).min(1),
  building_type: z.array(z.nativeEnum(BuildingType)).min(1),
  sale_price: PriceBoundsSchema,
  deposit: PriceBoundsSchema,
  monthly_rent: PriceBoundsSchema,
  area_range: z.nativeEnum(AreaBucket).nullable().optional(),
});

export type KeywordFilter = z.infer<typeof KeywordFilterSchema>;

function toRange(bounds: number[] | null | undefined): NumericRange | undefined {
  if (!bounds || bounds.length === 0) {
    return undefined;
  }
  return bounds.length === 1 ? { max: bounds[0] } : { min: bounds[0], max: bounds[1] };
}

/**
 * Converts an extracted keyword object into the crawler's filter shape
 */
export function toSearchFilter(keywords: KeywordFilter): SearchFilter {
  return {
    address: keywords.address.trim(),
    transactionTypes: unique(keywords.transaction_type),
    buildingTypes: unique(keywords.building_type),
    salePriceRange: toRange(keywords.sale_price),
    depositRange: toRange(keywords.deposit),
    monthlyRentRange: toRange(keywords.monthly_rent),
    areaBucket: keywords.area_range ?? undefined,
  };
}

/**
 * Flattens zod issues into "path: message" strings
 */
export function describeIssues(issues: ZodIssue[]): string[] {
  return issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
  );
}
