export type OpinionKind = "mem" | "op" | "con" | "dis";

export interface OpinionClassification {
  kind?: OpinionKind;
  justice?: string;
}

const JUSTICE_PATTERNS: Record<"con" | "dis", { fromDisposition: RegExp; fromDescription: RegExp }> = {
  con: {
    fromDisposition: /(?:concurring )?opinion by (?:chief )?justice (\w+)/,
    fromDescription: /concurring opinion by (?:chief )?justice (\w+)/,
  },
  dis: {
    fromDisposition: /(?:dissenting )?opinion by (?:chief )?justice (\w+)/,
    fromDescription: /dissenting opinion by (?:chief )?justice (\w+)/,
  },
};

function findJustice(description: string, pattern: RegExp): string | undefined {
  return pattern.exec(description)?.[1];
}

/**
 * Classifies a docket document. A disposition that mentions a concurrence or dissent wins over
 * the document description; otherwise the description decides.
 */
export function classifyOpinion(description: string, disposition = ""): OpinionClassification {
  const desc = description.toLowerCase();
  const disp = disposition.toLowerCase();

  if (disp.includes("concurring")) {
    return { kind: "con", justice: findJustice(desc, JUSTICE_PATTERNS.con.fromDisposition) };
  }
  if (disp.includes("dissenting")) {
    return { kind: "dis", justice: findJustice(desc, JUSTICE_PATTERNS.dis.fromDisposition) };
  }

  if (desc.includes("memorandum")) {
    return { kind: "mem" };
  }
  if (desc.includes("dissenting")) {
    return { kind: "dis", justice: findJustice(desc, JUSTICE_PATTERNS.dis.fromDescription) };
  }
  if (desc.includes("concurring")) {
    return { kind: "con", justice: findJustice(desc, JUSTICE_PATTERNS.con.fromDescription) };
  }
  if (desc.includes("opinion")) {
    return { kind: "op" };
  }
  return {};
}

/**
 * Opinion type tokens for every document of one case, in docket order. Tokens are unique within
 * the case so each document keeps its own ledger identity.
 */
export function assignOpinionTypes(descriptions: readonly string[], disposition = ""): string[] {
  const used = new Map<string, number>();

  return descriptions.map((description, index) => {
    const { kind, justice } = classifyOpinion(description, disposition);
    let token: string;
    if (!kind) {
      token = descriptions.length > 1 ? `opinion_${index + 1}` : "opinion";
    } else if (justice && (kind === "con" || kind === "dis")) {
      token = `${kind}_${justice}`;
    } else {
      token = kind;
    }

    const seen = used.get(token) ?? 0;
    used.set(token, seen + 1);
    return seen === 0 ? token : `${token}_${seen + 1}`;
  });
}
