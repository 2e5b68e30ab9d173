/** GitLab never returns more than this many items per page. */
export const MAX_PER_PAGE = 100;

export function checkPerPage(perPage: number): string | null {
  if (!Number.isInteger(perPage) || perPage < 1 || perPage > MAX_PER_PAGE) {
    return `--per-page must be an integer between 1 and ${MAX_PER_PAGE}`;
  }
  return null;
}

export function checkPage(page: number, perPage: number): string | null {
  if (!Number.isInteger(page) || page < 1) return "--page must be a positive integer";
  return checkPerPage(perPage);
}
