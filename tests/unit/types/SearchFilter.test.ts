import { describe, it, expect } from 'vitest';
import {
  AreaBucket,
  BuildingType,
  KeywordFilterSchema,
  SearchFilterSchema,
  TransactionType,
  describeIssues,
  hasProvinceAndDistrict,
  toSearchFilter,
} from '../../../src/types/SearchFilter';

describe('SearchFilter Schema', () => {
  it('should accept a minimal filter and trim the address', () => {
    const result = SearchFilterSchema.safeParse({
      address: '  서울시 강남구  ',
      transactionTypes: ['매매'],
      buildingTypes: ['아파트'],
    });

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data).toEqual({
        address: '서울시 강남구',
        transactionTypes: [TransactionType.SALE],
        buildingTypes: [BuildingType.APARTMENT],
      });
    }
  });

  it('should remove duplicate selections', () => {
    const result = SearchFilterSchema.parse({
      address: '서울시 강남구',
      transactionTypes: ['매매', '전세', '매매'],
      buildingTypes: ['빌라', '빌라'],
    });

    expect(result.transactionTypes).toEqual(['매매', '전세']);
    expect(result.buildingTypes).toEqual(['빌라']);
  });

  it('should reject an address without a district', () => {
    const result = SearchFilterSchema.safeParse({
      address: '강남구',
      transactionTypes: ['매매'],
      buildingTypes: ['아파트'],
    });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(describeIssues(result.error.issues)).toEqual([
        'address: Address needs at least a province and a district token',
      ]);
    }
  });

  it('should reject unknown labels and empty selections', () => {
    const result = SearchFilterSchema.safeParse({
      address: '서울시 강남구',
      transactionTypes: ['임대'],
      buildingTypes: [],
    });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues.map((issue) => issue.path.join('.'))).toEqual([
        'transactionTypes.0',
        'buildingTypes',
      ]);
    }
  });

  it('should reject ranges that are empty or inverted', () => {
    const base = { address: '서울시 강남구', transactionTypes: ['매매'], buildingTypes: ['아파트'] };

    expect(SearchFilterSchema.safeParse({ ...base, salePriceRange: {} }).success).toBe(false);
    expect(SearchFilterSchema.safeParse({ ...base, depositRange: { min: 5, max: 1 } }).success).toBe(false);
    expect(SearchFilterSchema.safeParse({ ...base, monthlyRentRange: { min: -1 } }).success).toBe(false);
    expect(SearchFilterSchema.safeParse({ ...base, monthlyRentRange: { max: 500_000 } }).success).toBe(true);
  });

  it('should count address tokens', () => {
    expect(hasProvinceAndDistrict('서울시 강남구')).toBe(true);
    expect(hasProvinceAndDistrict(' 서울시   강남구 역삼동 ')).toBe(true);
    expect(hasProvinceAndDistrict('서울시')).toBe(false);
  });
});

describe('KeywordFilter Schema', () => {
  const keywords = {
    address: '서울시 강남구 역삼동',
    transaction_type: ['매매', '전세'],
    building_type: ['아파트'],
    sale_price: [500_000_000, 800_000_000],
    deposit: null,
    monthly_rent: [1_000_000],
    area_range: '30평대',
  };

  it('should accept the extracted keyword object', () => {
    expect(KeywordFilterSchema.safeParse(keywords).success).toBe(true);
  });

  it('should reject a price pair whose minimum exceeds its maximum', () => {
    const result = KeywordFilterSchema.safeParse({ ...keywords, sale_price: [9, 1] });
    expect(result.success).toBe(false);
  });

  it('should reject price arrays with more than two values', () => {
    expect(KeywordFilterSchema.safeParse({ ...keywords, deposit: [1, 2, 3] }).success).toBe(false);
  });

  it('should convert to the crawler filter', () => {
    const filter = toSearchFilter(KeywordFilterSchema.parse(keywords));

    expect(filter).toEqual({
      address: '서울시 강남구 역삼동',
      transactionTypes: [TransactionType.SALE, TransactionType.LEASE],
      buildingTypes: [BuildingType.APARTMENT],
      salePriceRange: { min: 500_000_000, max: 800_000_000 },
      depositRange: undefined,
      monthlyRentRange: { max: 1_000_000 },
      areaBucket: AreaBucket.FROM_30,
    });
    expect(SearchFilterSchema.safeParse(filter).success).toBe(true);
  });
});
