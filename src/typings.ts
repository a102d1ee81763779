export interface User {
  firstName: string;
  lastName: string;
  email: string;
  pubkey?: Uint8Array; // unused
  username?: string; // unused
}

export interface Tag {
  id?: number;
  created?: Date;
  name: string;
}

export interface Post {
  id: string; // {src}/{id}.md
  title: string; // title: …
  description: string; // description: …
  date: Date; // date: <RFC 1123>
  author: User; // author: First Last <email>
  tags: Tag[]; // tags: a, b, c
  text: string; // body markdown, frontmatter lines removed
  html: string; // rendered body
  url: string; // /posts/{id}.html
  signed: boolean; // unused
  signature?: Uint8Array; // unused
}

export interface SiteOptions {
  title: string;
  link: string;
  description: string;
  copyright: string;
  author: { name: string; email: string };
}

export interface BuildOptions {
  src: string;
  templates: string;
  dest: string;
  /** default: DefaultSite */
  site?: SiteOptions;
  /** default: console.log */
  log?: (message: string) => void;
}

export interface WatchOptions {
  dir: string;
  command: string;
  /** default: "static" */
  root?: string;
  /** default: ":8080" */
  address?: string;
  /** default: runCommand */
  run?: (command: string) => Promise<void>;
  /** default: console.log */
  log?: (message: string) => void;
}

export interface WatchHandle {
  port: number;
  /** resolves on close, rejects on a watcher or server failure */
  done: Promise<void>;
  /** resolves once every queued command has finished */
  idle(): Promise<void>;
  close(): Promise<void>;
}

/** Data handed to `default.html`. */
export interface PostPage {
  post: Post;
}

/** Data handed to `index.html`, `about.html`, `contact.html` and `archive.html`. */
export interface ListPage {
  title: string;
  posts?: Post[];
  author?: User;
}
