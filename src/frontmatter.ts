import { formatRFC1123 } from "./dates";
import type { Post, Tag, User } from "./typings";

export type MetaKind = "author" | "title" | "date" | "tags" | "description";

export type Line = { kind: MetaKind; value: string } | { kind: "body"; value: string };

// tested in this order, first match wins; only ASCII whitespace separates the value
const patterns: [MetaKind, RegExp][] = [
  ["author", /^author:[\t\n\f\r ](.*)$/s],
  ["title", /^title:[\t\n\f\r ](.*)$/s],
  ["date", /^date:[\t\n\f\r ](.*)$/s],
  ["tags", /^tags:[\t\n\f\r ](.*)$/s],
  ["description", /^description:[\t\n\f\r ](.*)$/s],
];

export function classifyLine(line: string): Line {
  for (const [kind, re] of patterns) {
    const match = re.exec(line);
    if (match) return { kind, value: match[1] };
  }
  return { kind: "body", value: line };
}

const userLine = /^(.*)[\t\n\f\r ](.*)[\t\n\f\r ]<(.*)>$/s;

/** `First Last <user@example.com>`; anything else gives an empty user. */
export function parseUser(s: string): User {
  const match = userLine.exec(s);
  if (!match) return { firstName: "", lastName: "", email: "" };
  return { firstName: match[1], lastName: match[2], email: match[3] };
}

export function combineUser(u: User): string {
  return `${u.firstName} ${u.lastName}`;
}

export function parseTags(s: string): Tag[] {
  return s.split(",").map((name) => ({ name: name.trim() }));
}

export function joinTags(tags: Tag[]): string[] {
  return tags.map((t) => t.name);
}

export function tagsToString(tags: Tag[]): string {
  return joinTags(tags).join(", ");
}

export function stringifyFrontmatter(post: Post): string[] {
  const { author } = post;
  return [
    `author: ${combineUser(author)} <${author.email}>`,
    `title: ${post.title}`,
    `date: ${formatRFC1123(post.date)}`,
    `tags: ${tagsToString(post.tags)}`,
    `description: ${post.description}`,
  ];
}

/** Splits like a line scanner: `\n` ends a line, a trailing `\r` is dropped, no empty last line. */
export function splitLines(raw: string): string[] {
  if (raw === "") return [];
  const lines = raw.split("\n");
  if (lines[lines.length - 1] === "") lines.pop();
  return lines.map((l) => (l.endsWith("\r") ? l.slice(0, -1) : l));
}
