export const QUESTIONS_PER_PAGE = 10;

export interface PageWindow {
  offset: number;
  limit: number;
}

/** 1-indexed page → `[offset, offset + limit)` window. Pages past the end are not clamped. */
export const pageWindow = (page: number, perPage: number = QUESTIONS_PER_PAGE): PageWindow => ({
  offset: (page - 1) * perPage,
  limit: perPage,
});
