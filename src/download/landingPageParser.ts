import { load } from "cheerio";

export interface LandingPageLink {
  url: string;
  label: string;
}

function sanitizeLabel(value: string): string {
  return value.replace(/\s+/g, " ").trim();
}

function resolveUrl(baseUrl: string, href: string): string | undefined {
  try {
    const resolved = new URL(href, baseUrl);
    resolved.hash = "";
    return resolved.protocol === "http:" || resolved.protocol === "https:" ? resolved.toString() : undefined;
  } catch {
    return undefined;
  }
}

function looksLikePdf(url: string): boolean {
  const lower = url.toLowerCase();
  return lower.includes(".pdf") || lower.includes("/pdf/") || lower.includes("type=pdf") || lower.endsWith("/pdf");
}

/**
 * PDF links of a publisher landing page in document order: the
 * `citation_pdf_url` meta tag first, then anchors that point at a PDF.
 */
export function extractPdfLinksFromHtml(html: string, pageUrl: string): LandingPageLink[] {
  const $ = load(html);
  const links: LandingPageLink[] = [];
  const seen = new Set<string>();

  const add = (href: string | undefined, label: string): void => {
    if (!href) {
      return;
    }
    const url = resolveUrl(pageUrl, href.trim());
    if (!url || seen.has(url) || url === pageUrl) {
      return;
    }
    seen.add(url);
    links.push({ url, label: sanitizeLabel(label) || url.split("/").pop() || url });
  };

  $("meta[name='citation_pdf_url']").each((_, element) => {
    add($(element).attr("content"), "citation_pdf_url");
  });

  $("a[href]").each((_, element) => {
    const href = $(element).attr("href");
    const type = ($(element).attr("type") ?? "").toLowerCase();
    if (!href || !(type === "application/pdf" || looksLikePdf(href))) {
      return;
    }
    add(href, sanitizeLabel($(element).text()) || $(element).attr("title") || "");
  });

  return links;
}
