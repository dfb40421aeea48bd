import { ApiError } from '../middlewares/errorHandler';
import { CategoryMap, CategoryRecord } from '../models/types';

export const toCategoryMap = (categories: CategoryRecord[]): CategoryMap => {
  const map: CategoryMap = {};
  for (const category of categories) {
    map[String(category.id)] = category.type;
  }
  return map;
};

// Route ids that are not positive integers cannot name a row.
export const parseIdParam = (value: string): number => {
  if (!/^\d+$/.test(value)) {
    throw new ApiError(404);
  }
  const id = Number(value);
  if (!Number.isSafeInteger(id) || id < 1) {
    throw new ApiError(404);
  }
  return id;
};
