/**
 * PubMed efetch XML → canonical records.
 *
 * Every <PubmedArticle> becomes exactly one RecordOrSkipped. Missing required
 * fields are reported, never defaulted.
 */

import {
  REQUIRED_RECORD_FIELDS,
  type CanonicalRecord,
  type PublicationDateSource,
  type RecordOrSkipped,
  type RequiredRecordField,
} from "../records/schema.js";
import { childText, innerText, parseXml, select, selectAll, type XmlElement } from "./xml.js";

// ---------------------------------------------------------------------------
// Dates
// ---------------------------------------------------------------------------

const MONTHS: Record<string, number> = {
  jan: 1, january: 1,
  feb: 2, february: 2,
  mar: 3, march: 3,
  apr: 4, april: 4,
  may: 5,
  jun: 6, june: 6,
  jul: 7, july: 7,
  aug: 8, august: 8,
  sep: 9, sept: 9, september: 9,
  oct: 10, october: 10,
  nov: 11, november: 11,
  dec: 12, december: 12,
};

export function monthToNumber(monthText: string): number | null {
  const month = monthText.trim().replace(/\.+$/, "").toLowerCase();
  if (!month) {
    return null;
  }
  const named = MONTHS[month];
  if (named !== undefined) {
    return named;
  }
  const numeric = /\b(0?[1-9]|1[0-2])\b/.exec(month)?.[1];
  return numeric !== undefined ? Number(numeric) : null;
}

/**
 * Normalize date parts to YYYY, YYYY-MM or YYYY-MM-DD; "" without a year.
 */
export function normalizeDate(yearText: string, monthText = "", dayText = ""): string {
  const year = /\b(\d{4})\b/.exec(yearText.trim())?.[1];
  if (year === undefined) {
    return "";
  }
  const monthNum = monthToNumber(monthText);
  if (monthNum === null) {
    return year;
  }
  const month = String(monthNum).padStart(2, "0");

  const dayMatch = /\b([0-2]?\d|3[0-1])\b/.exec(dayText.trim())?.[1];
  const day = dayMatch === undefined ? 0 : Number(dayMatch);
  if (day <= 0) {
    return `${year}-${month}`;
  }
  return `${year}-${month}-${String(day).padStart(2, "0")}`;
}

/**
 * Normalize free-form MedlineDate values such as "2022 Sep-Oct" or "1998 Dec 7-14".
 */
export function normalizeMedlineDate(medlineDate: string): string {
  const text = medlineDate.trim();
  const yearMatch = /\b(\d{4})\b/.exec(text);
  const year = yearMatch?.[1];
  if (!yearMatch || year === undefined) {
    return "";
  }
  const remainder = text.slice(yearMatch.index + yearMatch[0].length);

  const monthMatch = /\b([A-Za-z]{3,9})\.?\b/.exec(remainder);
  const monthToken = monthMatch?.[1] ?? "";
  let dayToken = "";
  if (monthMatch && monthToken) {
    const afterMonth = remainder.slice(monthMatch.index + monthMatch[0].length);
    dayToken = /\b([0-2]?\d|3[0-1])\b/.exec(afterMonth)?.[1] ?? "";
  }
  return normalizeDate(year, monthToken, dayToken);
}

interface PublicationDate {
  date: string;
  raw: string;
  source: PublicationDateSource;
}

function extractPublicationDate(article: XmlElement): PublicationDate {
  for (const articleDate of selectAll(article, "Article/ArticleDate")) {
    if ((articleDate.attributes["DateType"] ?? "").trim().toLowerCase() !== "electronic") {
      continue;
    }
    const parts = ["Year", "Month", "Day"].map((name) => childText(articleDate, name));
    const [year = "", month = "", day = ""] = parts;
    const date = normalizeDate(year, month, day);
    if (date) {
      const raw = parts.filter(Boolean).join("-");
      return { date, raw: raw || date, source: "electronic_pub_date" };
    }
  }

  const pubDate = select(article, "Article/Journal/JournalIssue/PubDate");
  if (pubDate) {
    const parts = ["Year", "Month", "Day"].map((name) => childText(pubDate, name));
    const [year = "", month = "", day = ""] = parts;
    const date = normalizeDate(year, month, day);
    if (date) {
      const raw = parts.filter(Boolean).join(" ");
      return { date, raw: raw || date, source: "journal_issue_pub_date" };
    }
    const medlineDate = childText(pubDate, "MedlineDate");
    const medline = normalizeMedlineDate(medlineDate);
    if (medline) {
      return { date: medline, raw: medlineDate, source: "journal_issue_pub_date" };
    }
  }

  return { date: "", raw: "", source: "unknown" };
}

// ---------------------------------------------------------------------------
// Fields
// ---------------------------------------------------------------------------

function extractAbstract(article: XmlElement): string {
  const parts: string[] = [];
  for (const node of selectAll(article, "Article/Abstract/AbstractText")) {
    const text = innerText(node).trim();
    if (!text) {
      continue;
    }
    const label = node.attributes["Label"];
    parts.push(label ? `${label}: ${text}` : text);
  }
  return parts.join("\n").trim();
}

function extractYear(article: XmlElement, publicationDate: string): string {
  const year = select(article, "Article/Journal/JournalIssue/PubDate/Year");
  if (year) {
    const text = innerText(year).trim();
    if (text) {
      return text;
    }
  }
  const medline = select(article, "Article/Journal/JournalIssue/PubDate/MedlineDate");
  if (medline) {
    const text = innerText(medline).trim();
    if (text) {
      return /^\d{4}/.test(text) ? text.slice(0, 4) : text;
    }
  }
  return publicationDate ? (publicationDate.split("-")[0] ?? "") : "";
}

function extractAuthors(article: XmlElement): string[] {
  const authors: string[] = [];
  for (const author of selectAll(article, "Article/AuthorList/Author")) {
    const collective = childText(author, "CollectiveName");
    if (collective) {
      authors.push(collective);
      continue;
    }
    const name = `${childText(author, "ForeName")} ${childText(author, "LastName")}`.trim();
    if (name) {
      authors.push(name);
    }
  }
  return authors;
}

function extractArticleIds(article: XmlElement): { doi: string | null; pmcid: string | null } {
  let doi: string | null = null;
  let pmcid: string | null = null;
  for (const articleId of selectAll(article, "PubmedData/ArticleIdList/ArticleId")) {
    const value = innerText(articleId).trim();
    if (!value) {
      continue;
    }
    const idType = articleId.attributes["IdType"];
    if (idType === "doi") {
      doi = value;
    } else if (idType === "pmc") {
      pmcid = value.startsWith("PMC") ? value : `PMC${value}`;
    }
  }
  return { doi, pmcid };
}

function textAt(article: XmlElement, path: string): string {
  const el = select(article, path);
  return el ? innerText(el).trim() : "";
}

/**
 * Normalize one <PubmedArticle> element.
 */
export function extractRecord(article: XmlElement): RecordOrSkipped {
  const pmid = textAt(article, "MedlineCitation/PMID");
  if (!/^\d+$/.test(pmid)) {
    return { kind: "skipped", id: pmid, reason: "invalid_id", missingFields: [] };
  }

  const publication = extractPublicationDate(article);
  const fields: Record<RequiredRecordField, string> = {
    title: textAt(article, "Article/ArticleTitle"),
    abstract: extractAbstract(article),
    journal: textAt(article, "Article/Journal/Title"),
    year: extractYear(article, publication.date),
  };

  const missingFields = REQUIRED_RECORD_FIELDS.filter((field) => fields[field] === "");
  if (missingFields.length > 0) {
    return { kind: "skipped", id: pmid, reason: "missing_fields", missingFields };
  }

  const record: CanonicalRecord = {
    pmid,
    ...fields,
    authors: extractAuthors(article),
    ...extractArticleIds(article),
    publicationTypes: selectAll(article, "PublicationTypeList/PublicationType")
      .map((pt) => innerText(pt).trim())
      .filter(Boolean),
    publicationDate: publication.date,
    publicationDateRaw: publication.raw,
    publicationDateSource: publication.source,
  };
  return { kind: "record", record };
}

/**
 * Parse an efetch response body. Throws XmlPayloadError on malformed XML.
 */
export function parseArticleSet(xml: string): RecordOrSkipped[] {
  const root = parseXml(xml);
  return selectAll(root, "PubmedArticle").map(extractRecord);
}
