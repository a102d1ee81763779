import { readFileSync } from "fs";
import { formatRFC1123, parseRFC1123, zeroDate } from "./dates";
import { BuildError, messageOf } from "./errors";
import { classifyLine, combineUser, joinTags, parseTags, parseUser, splitLines } from "./frontmatter";
import { parse } from "./marked";
import type { Post, Tag, User } from "./typings";

/** @internal */
class _Post implements Post {
  declare id: string;
  declare title: string;
  declare description: string;
  declare date: Date;
  declare author: User;
  declare tags: Tag[];
  declare text: string;
  declare html: string;
  declare url: string;
  declare signed: boolean;
  constructor(id: string) {
    this.id = id;
    this.title = "";
    this.description = "";
    this.date = zeroDate();
    this.author = { firstName: "", lastName: "", email: "" };
    this.tags = [];
    this.text = "";
    this.html = "";
    this.url = "";
    this.signed = false;
  }
}

export function parsePost(
  id: string,
  raw: string,
  file = `${id}.md`,
  log: (message: string) => void = console.log
): Post {
  const post = new _Post(id);
  const body: string[] = [];

  for (const line of splitLines(raw)) {
    const { kind, value } = classifyLine(line);
    switch (kind) {
      case "author":
        post.author = parseUser(value);
        log(`Author: ${combineUser(post.author)} (${post.author.email})`);
        break;
      case "title":
        post.title = value;
        log(`Title: ${post.title}`);
        break;
      case "date":
        try {
          post.date = parseRFC1123(value);
        } catch (err) {
          throw new BuildError("date", messageOf(err), file, err);
        }
        log(`Date: ${formatRFC1123(post.date)}`);
        break;
      case "tags":
        post.tags.push(...parseTags(value));
        log(`Tags: ${joinTags(post.tags).join(" ")}`);
        break;
      case "description":
        post.description = value;
        log(`Description: ${post.description}`);
        break;
      case "body":
        body.push(value + "\n");
        break;
    }
  }

  post.text = body.join("");
  return post;
}

export function loadPost(file: string, id: string, log?: (message: string) => void): Post {
  let raw: string;
  try {
    raw = readFileSync(file, "utf-8");
  } catch (err) {
    throw new BuildError("read", messageOf(err), file, err);
  }
  return parsePost(id, raw, file, log);
}

export function renderPost(post: Post): Post {
  post.html = parse(post.text);
  post.url = `/posts/${post.id}.html`;
  return post;
}

/** Most recent first. Equal dates keep their input order. */
export function sortPosts(posts: readonly Post[]): Post[] {
  return [...posts].sort((a, b) => +b.date - +a.date);
}
