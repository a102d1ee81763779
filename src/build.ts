import { readdirSync } from "fs";
import { join } from "path";
import { BuildError, messageOf } from "./errors";
import { writeFeeds } from "./feed";
import { loadPost, renderPost, sortPosts } from "./post";
import { loadTemplates, renderTemplate } from "./template";
import type { BuildOptions, ListPage, Post, PostPage, SiteOptions } from "./typings";

export const DefaultSite: SiteOptions = {
  title: "mdpress - All posts",
  link: "http://localhost:8080/",
  description: "A blog built with mdpress",
  copyright: "All rights reserved",
  author: { name: "Anonymous", email: "nobody@example.com" },
};

/** How many of the newest posts are left out of `archive.html`. */
export const ARCHIVE_SKIP = 5;

function listSources(src: string): string[] {
  try {
    return readdirSync(src, { withFileTypes: true })
      .filter((e) => e.isFile() && e.name.endsWith(".md"))
      .map((e) => e.name)
      .sort();
  } catch (err) {
    throw new BuildError("read", messageOf(err), src, err);
  }
}

export function build(options: BuildOptions): Post[] {
  const { src, templates, dest, site = DefaultSite, log = console.log } = options;

  const set = loadTemplates(templates);
  log(`Generating static html from ${src} to ${dest}`);

  const files = listSources(src);
  if (files.length === 0) {
    throw new BuildError("read", "no posts found", src);
  }

  const posts: Post[] = [];
  for (const file of files) {
    const id = file.slice(0, -3);
    const post = renderPost(loadPost(join(src, file), id, log));
    log("-----");
    const page: PostPage = { post };
    renderTemplate(set, join(dest, "posts", `${id}.html`), "default.html", page);
    posts.push(post);
  }

  const sorted = sortPosts(posts);
  const author = sorted[0].author;

  const pages: [string, ListPage][] = [
    ["index.html", { title: "", posts: sorted }],
    ["about.html", { title: "About", author }],
    ["contact.html", { title: "Contact", author }],
    [
      "archive.html",
      { title: "Archive", posts: sorted.length < ARCHIVE_SKIP ? sorted : sorted.slice(ARCHIVE_SKIP) },
    ],
  ];
  for (const [name, data] of pages) {
    renderTemplate(set, join(dest, name), name, data);
  }

  writeFeeds(dest, sorted, site);
  return sorted;
}
