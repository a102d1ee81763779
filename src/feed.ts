import { writeFileSync } from "fs";
import { Feed } from "feed";
import { join } from "path";
import { name } from "../package.json";
import { zeroDate } from "./dates";
import { BuildError, messageOf } from "./errors";
import { combineUser } from "./frontmatter";
import type { Post, SiteOptions } from "./typings";

export function createFeed(posts: Post[], site: SiteOptions): Feed {
  const feed = new Feed({
    id: site.link,
    link: site.link,
    title: site.title,
    description: site.description,
    copyright: site.copyright,
    author: { ...site.author },
    updated: posts[0]?.date ?? zeroDate(),
    generator: name,
  });

  const base = site.link.replace(/\/+$/, "");
  for (const post of posts) {
    const link = base + post.url;
    feed.addItem({
      title: post.title,
      id: link,
      link,
      date: post.date,
      description: post.html,
      content: post.html,
      author: [{ name: combineUser(post.author), email: post.author.email || site.author.email }],
      category: post.tags.map((t) => ({ name: t.name })),
    });
  }

  return feed;
}

export function writeFeeds(dest: string, posts: Post[], site: SiteOptions) {
  const feed = createFeed(posts, site);
  for (const [file, render] of [
    ["atom.xml", () => feed.atom1()],
    ["rss.xml", () => feed.rss2()],
  ] as const) {
    const path = join(dest, file);
    try {
      writeFileSync(path, render());
    } catch (err) {
      throw new BuildError("feed", messageOf(err), path, err);
    }
  }
}
