import { load } from "cheerio";
import type { DocketCase, DocketDocument } from "./types";

const CASE_LINK_PATTERN = /Case\.aspx\?cn=.*-CR/i;
const CASE_NUMBER_PATTERN = /\d{2}-\d{2}-\d{5}-CR/;
const MEDIA_LINK_PATTERN = /SearchMedia\.aspx/i;
// The docket page sometimes leaks an unrendered server-side expression into document hrefs.
const COURT_PLACEHOLDER = '" + this.CurrentWebState.CurrentCourt + @"';

function sanitizeText(value: string): string {
  return value.replace(/\s+/g, " ").trim();
}

function normalizeUrl(baseUrl: string, href: string): string | undefined {
  try {
    return new URL(href, baseUrl).toString();
  } catch {
    return undefined;
  }
}

export function extractCaseNumber(text: string): string | undefined {
  return CASE_NUMBER_PATTERN.exec(text)?.[0];
}

/**
 * Parses the "Criminal Causes Decided" grid of a court's docket page. Rows without a criminal
 * case link or without any opinion document are skipped.
 */
export function parseCriminalCauses(html: string, pageUrl: string, sourceId: string): DocketCase[] {
  const $ = load(html);

  const markers = $("h3, table.rgMasterTable").toArray();
  const headingIndex = markers.findIndex(
    (element) => $(element).is("h3") && $(element).text().includes("Criminal Causes Decided"),
  );
  if (headingIndex < 0) {
    return [];
  }

  const gridElement = markers.slice(headingIndex + 1).find((element) => $(element).is("table.rgMasterTable"));
  if (!gridElement) {
    return [];
  }

  const grid = $(gridElement);
  const cases: DocketCase[] = [];
  grid
    .children("tbody")
    .first()
    .children("tr.rgRow, tr.rgAltRow")
    .each((_, rowElement) => {
      const row = $(rowElement);

      const caseLink = row
        .find("a[href]")
        .filter((__, anchor) => CASE_LINK_PATTERN.test($(anchor).attr("href") ?? ""))
        .first();
      if (caseLink.length === 0) {
        return;
      }

      const caseNumber = extractCaseNumber(sanitizeText(caseLink.text()));
      if (!caseNumber) {
        return;
      }

      const dispositionCell = row.find("td.caseDisp").first();
      const disposition = sanitizeText(
        dispositionCell.length > 0 ? dispositionCell.text() : row.children("td").eq(2).text(),
      );

      const documents: DocketDocument[] = [];
      row.find("table.docGrid").each((__, docTable) => {
        const mediaLink = $(docTable)
          .find("a[href]")
          .filter((___, anchor) => MEDIA_LINK_PATTERN.test($(anchor).attr("href") ?? ""))
          .first();
        const href = mediaLink.attr("href");
        if (!href) {
          return;
        }

        const url = normalizeUrl(pageUrl, href.split(COURT_PLACEHOLDER).join(sourceId));
        if (!url) {
          return;
        }

        const description = sanitizeText(mediaLink.closest("td").prev("td").text());
        documents.push({ url, description });
      });

      if (documents.length === 0) {
        return;
      }

      const caseHref = caseLink.attr("href");
      cases.push({
        caseNumber,
        caseUrl: caseHref ? normalizeUrl(pageUrl, caseHref) : undefined,
        disposition,
        documents,
      });
    });

  return cases;
}
