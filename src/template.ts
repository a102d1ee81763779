import { mkdirSync, readFileSync, readdirSync, writeFileSync } from "fs";
import { dirname, join } from "path";
import { formatRFC1123, formatShortDate } from "./dates";
import { BuildError, messageOf } from "./errors";
import type { Post, Tag } from "./typings";

/** Markup that `{ expr }` inserts without escaping. */
export class SafeHTML {
  declare html: string;
  constructor(html: string) {
    this.html = html;
  }
  toString() {
    return this.html;
  }
}

const entities: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&#34;",
  "'": "&#39;",
};

export function escapeHTML(value: unknown): string {
  if (value instanceof SafeHTML) return value.html;
  if (value === undefined || value === null) return "";
  return String(value).replace(/[&<>"']/g, (c) => entities[c]);
}

function nextMustacheTag(template: string) {
  let i = template.indexOf("{");
  // { expr } -> escape(eval(expr))
  // {{ expr }} -> '{ expr }'
  if (i !== -1) {
    if (template[i + 1] === "{") {
      let j = template.indexOf("}}", i + 2);
      if (j !== -1) {
        return {
          head: template.slice(0, i),
          tail: template.slice(j + 2),
          raw: template.slice(i + 1, j + 1),
        };
      }
    }
    let j = template.indexOf("}", i + 1);
    if (j !== -1) {
      return {
        head: template.slice(0, i),
        tail: template.slice(j + 1),
        expr: template.slice(i + 1, j),
      };
    }
  }
}

const isOpen = (expr: string) => expr.startsWith("#each") || expr.startsWith("#if");

function parse(template: string) {
  const parts: { raw?: string; expr?: string }[] = [];
  let indent_size = 4;
  function update_indent_size(raw: string) {
    const m = raw.match(/^ */);
    const l = m && m[0].length;
    l && (indent_size = Math.min(indent_size, l));
  }
  while (true) {
    const tag = nextMustacheTag(template);
    if (tag === undefined) {
      parts.push({ raw: template });
      update_indent_size(template);
      break;
    }
    parts.push({ raw: tag.head });
    update_indent_size(tag.head);
    if (tag.raw) {
      parts.push({ raw: tag.raw });
      update_indent_size(tag.raw);
    }
    if (tag.expr) {
      parts.push({ expr: tag.expr });
    }
    template = tag.tail;
  }
  // remove extra newline and indent from expr closures {#expr}...{/expr}
  let indent = 0;
  let last2: { raw?: string; expr?: string }[] = [{}, {}];
  for (const part of parts) {
    if (part.raw && indent) {
      part.raw = part.raw.trimStart().replace(new RegExp(`^ {${indent * indent_size}}`, "gm"), "");
    }
    if (part.expr && isOpen(part.expr)) {
      indent++;
      // remove extra space between {/last}...{#current}
      if (last2[0].expr && last2[0].expr[0] === "/" && last2[1].raw) {
        last2[1].raw = last2[1].raw.trimEnd();
      }
    }
    if (part.expr && part.expr[0] === "/") {
      indent--;
    }
    last2.push(part);
    last2.shift();
  }
  return parts;
}

export type Render = (...args: unknown[]) => string;

/**
 * Compiles `template` into a function taking `argument`, e.g. `"data, { shortDate }"`.
 *
 * - `{ expr }` is escaped unless it is a {@link SafeHTML}
 * - `{{ text }}` is the literal `{ text }`
 * - `{#each list as x}`, `{#if c}`, `{#else if c}`, `{#else}`, `{/each}`, `{/if}`
 * - `{@ statement }`
 */
export function compile(template: string, argument: string): Render {
  const parts = parse(template);
  let code = `let html = '';`;
  parts.forEach((p) => {
    if (p.raw) {
      code += `html += ${JSON.stringify(p.raw)};`;
    }
    if (p.expr) {
      if (p.expr.startsWith("#each")) {
        const expr = p.expr.slice(5).trim();
        const [list, x] = expr.split(" as ");
        code += `for (const ${x} of ${list}) {`;
      } else if (p.expr.startsWith("#if")) {
        const expr = p.expr.slice(3).trim();
        code += `if (${expr}) {`;
      } else if (p.expr.startsWith("#else if")) {
        const expr = p.expr.slice(8).trim();
        code += `} else if (${expr}) {`;
      } else if (p.expr.trim() === "#else") {
        code += `} else {`;
      } else if (p.expr.startsWith("/")) {
        code += "}";
      } else if (p.expr.startsWith("@")) {
        const expr = p.expr.slice(1).trim();
        code += `${expr};`;
      } else {
        code += `html += $escape(${p.expr.trim()});`;
      }
    }
  });
  code += `return html;`;
  const fn = new Function("$escape", argument, code);
  return (...args) => String(fn(escapeHTML, ...args));
}

export interface Helpers {
  formatDate(d: Date): string;
  shortDate(d: Date): string;
  printByte(b: Uint8Array | string): string;
  lop(posts: Post[], start: number, end: number): Post[];
  joinTags(tags: Tag[]): SafeHTML;
  printHTML(b: Uint8Array | string): SafeHTML;
  hasTitle(s: string): boolean;
  include(name: string, data: unknown): SafeHTML;
}

const HELPER_ARGUMENT = "data, { formatDate, shortDate, printByte, lop, joinTags, printHTML, hasTitle, include }";

const decoder = /* @__PURE__ */ new TextDecoder();

function printByte(b: Uint8Array | string): string {
  return typeof b === "string" ? b : decoder.decode(b);
}

/** Never reads past the end: with `end > posts.length` the whole list comes back. */
export function lop<T>(posts: T[], start: number, end: number): T[] {
  if (posts.length < end) return posts;
  return posts.slice(start, end);
}

export class TemplateSet {
  declare dir: string;
  declare templates: Map<string, Render>;
  declare helpers: Helpers;
  constructor(dir: string, templates: Map<string, Render>) {
    this.dir = dir;
    this.templates = templates;
    this.helpers = {
      formatDate: formatRFC1123,
      shortDate: formatShortDate,
      printByte,
      lop,
      joinTags: (tags) => new SafeHTML(tags.map((t) => escapeHTML(t.name)).join(", ")),
      printHTML: (b) => new SafeHTML(printByte(b)),
      hasTitle: (s) => s !== "",
      include: (name, data) => new SafeHTML(this.execute(name, data)),
    };
  }

  execute(name: string, data: unknown): string {
    const render = this.templates.get(name);
    if (!render) {
      throw new Error(`no such template "${name}" in ${this.dir}`);
    }
    return render(data, this.helpers);
  }
}

export function loadTemplates(dir: string): TemplateSet {
  let files: string[];
  try {
    files = readdirSync(dir).filter((f) => f.endsWith(".html"));
  } catch (err) {
    throw new BuildError("template", messageOf(err), dir, err);
  }
  const templates = new Map<string, Render>();
  for (const file of files.sort()) {
    const path = join(dir, file);
    try {
      templates.set(file, compile(readFileSync(path, "utf-8"), HELPER_ARGUMENT));
    } catch (err) {
      throw new BuildError("template", messageOf(err), path, err);
    }
  }
  return new TemplateSet(dir, templates);
}

export function renderTemplate(set: TemplateSet, dest: string, name: string, data: unknown) {
  let html: string;
  try {
    html = set.execute(name, data);
  } catch (err) {
    throw new BuildError("render", messageOf(err), dest, err);
  }
  try {
    mkdirSync(dirname(dest), { recursive: true });
    writeFileSync(dest, html);
  } catch (err) {
    throw new BuildError("render", messageOf(err), dest, err);
  }
}
