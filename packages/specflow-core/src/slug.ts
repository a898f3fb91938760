export const DEFAULT_SLUG_WORDS = 3;

export function slugifyDescription(description: string, maxWords: number = DEFAULT_SLUG_WORDS): string {
  return description
    .toLowerCase()
    .replace(/[^a-z0-9]/g, "-")
    .replace(/-+/g, "-")
    .replace(/^-|-$/g, "")
    .split("-")
    .filter(word => word.length > 0)
    .slice(0, maxWords)
    .join("-");
}

export function buildBranchName(featureNumber: string, slug: string): string {
  return `${featureNumber}-${slug}`;
}
