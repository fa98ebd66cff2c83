import { load } from "cheerio";
import type { CaseParty } from "../types";

const STATE_PARTY = "State of Texas";

function sanitizeText(value: string): string {
  return value.replace(/\s+/g, " ").trim();
}

/**
 * Parses the "Parties" panel of a case page into parties and their attorneys. The State's own
 * rows are skipped, as are parties with no attorney listed.
 */
export function parseCaseParties(html: string): CaseParty[] {
  const $ = load(html);

  const heading = $("div.panel-heading")
    .filter((_, element) => $(element).text().includes("Parties"))
    .first();
  if (heading.length === 0) {
    return [];
  }

  const grid = heading.nextAll("div.panel-content").first().find("table.rgMasterTable").first();
  if (grid.length === 0) {
    return [];
  }

  const parties: CaseParty[] = [];
  grid
    .children("tbody")
    .first()
    .children("tr")
    .each((_, rowElement) => {
      const cells = $(rowElement).children("td");
      if (cells.length < 3) {
        return;
      }

      const partyName = sanitizeText(cells.eq(0).text());
      const partyType = sanitizeText(cells.eq(1).text());
      if (partyName.includes(STATE_PARTY) || partyType.includes(STATE_PARTY)) {
        return;
      }

      const attorneyCell = cells.eq(2);
      attorneyCell.find("br").replaceWith("\n");
      const representatives: string[] = [];
      for (const line of attorneyCell.text().split("\n")) {
        const name = sanitizeText(line);
        if (name.length > 0 && !representatives.includes(name)) {
          representatives.push(name);
        }
      }

      if (representatives.length > 0) {
        parties.push({ partyName, partyType, representatives });
      }
    });

  return parties;
}
