import { describe, expect, it } from "vitest";
import { docketHtml } from "../testing/docket";
import { extractCaseNumber, parseCriminalCauses } from "./docketParser";

const PAGE_URL = "https://courts.test/Docket.aspx?coa=coa01&FullDate=07/24/2025";

describe("parseCriminalCauses", () => {
  it("reads only the criminal grid", () => {
    const html = docketHtml([
      {
        caseNumber: "01-24-00001-CR",
        documents: [{ description: "Memorandum Opinion", href: "SearchMedia.aspx?MediaID=a" }],
      },
    ]);

    expect(parseCriminalCauses(html, PAGE_URL, "coa01")).toEqual([
      {
        caseNumber: "01-24-00001-CR",
        caseUrl: "https://courts.test/Case.aspx?cn=01-24-00001-CR&coa=coa01",
        disposition: "Affirmed",
        documents: [{ url: "https://courts.test/SearchMedia.aspx?MediaID=a", description: "Memorandum Opinion" }],
      },
    ]);
  });

  it("substitutes the leaked court placeholder in document links", () => {
    const html = docketHtml([
      {
        caseNumber: "01-24-00002-CR",
        documents: [
          {
            description: "Opinion",
            href: 'SearchMedia.aspx?MediaID=b&coa=" + this.CurrentWebState.CurrentCourt + @"&DT=Opinion',
          },
        ],
      },
    ]);

    const [parsed] = parseCriminalCauses(html, PAGE_URL, "coa01");
    expect(parsed.documents[0].url).toBe("https://courts.test/SearchMedia.aspx?MediaID=b&coa=coa01&DT=Opinion");
  });

  it("keeps every document of a case and skips cases without documents", () => {
    const html = docketHtml([
      {
        caseNumber: "01-24-00003-CR",
        disposition: "Affirmed; concurring opinion",
        documents: [
          { description: "Opinion", href: "SearchMedia.aspx?MediaID=c1" },
          { description: "Concurring Opinion by Justice Rivera", href: "SearchMedia.aspx?MediaID=c2" },
        ],
      },
      { caseNumber: "01-24-00004-CR", documents: [] },
    ]);

    const parsed = parseCriminalCauses(html, PAGE_URL, "coa01");
    expect(parsed.map((row) => row.caseNumber)).toEqual(["01-24-00003-CR"]);
    expect(parsed[0].documents.map((document) => document.description)).toEqual([
      "Opinion",
      "Concurring Opinion by Justice Rivera",
    ]);
  });

  it("returns nothing when the page has no criminal grid", () => {
    expect(parseCriminalCauses("<html><body><h3>Civil Causes Decided</h3></body></html>", PAGE_URL, "coa01")).toEqual([]);
  });
});

describe("extractCaseNumber", () => {
  it("finds a criminal case number inside surrounding text", () => {
    expect(extractCaseNumber("No. 05-23-01234-CR (consolidated)")).toBe("05-23-01234-CR");
    expect(extractCaseNumber("05-23-01234-CV")).toBeUndefined();
  });
});
