import { load } from "cheerio";
import type { RetailerConfig } from "../flyer-import/pattern-library";

const resolveUrl = (href: string, base: string): string | undefined => {
  try {
    return new URL(href, base).href;
  } catch {
    return undefined;
  }
};

/**
 * PDF links on a retailer's promo page, resolved against the page URL.
 * Links whose URL mentions one of the retailer's flyer name patterns come
 * first; otherwise page order is kept.
 */
export const findFlyerUrls = (html: string, retailer: RetailerConfig): string[] => {
  const $ = load(html);
  const base = retailer.flyerPage ?? retailer.baseUrl;

  const hrefs = $("a[href]")
    .map((_, link) => $(link).attr("href")?.trim() ?? "")
    .get()
    .filter((href) => href.toLowerCase().includes(".pdf"));
  const urls = [
    ...new Set(
      hrefs.flatMap((href) => {
        const url = resolveUrl(href, base);
        return url ? [url] : [];
      }),
    ),
  ];

  const looksLikeFlyer = (url: string) => {
    const lower = url.toLowerCase();
    return retailer.namePatterns.some((pattern) => lower.includes(pattern));
  };
  return [...urls.filter(looksLikeFlyer), ...urls.filter((url) => !looksLikeFlyer(url))];
};

export const flyerFileName = (retailerId: string, now: Date) => {
  const stamp = now.toISOString().replace(/[-:]/g, "").replace("T", "_").slice(0, 15);
  return `${retailerId}_${stamp}.pdf`;
};
