export * from "./typings";
export * from "./errors";
export * from "./dates";
export * from "./frontmatter";
export * from "./post";
export * from "./template";
export * from "./feed";
export * from "./build";
export * from "./watch";
export { parse as renderMarkdown } from "./marked";
