import Slugger from "github-slugger";
import hljs from "highlight.js";
import { marked } from "marked";

let slugger = /* @__PURE__ */ new Slugger();

let renderer: marked.RendererObject = {
  heading(text, level, raw) {
    return `<h${level} id="${slugger.slug(raw)}">${text}</h${level}>\n`;
  },
};

export const parse = /* @__PURE__ */ (function initMarked() {
  marked.use({
    gfm: true,
    highlight(code, lang) {
      const language = hljs.getLanguage(lang) ? lang : "plaintext";
      return hljs.highlight(code, { language }).value;
    },
    renderer,
  });
  return function parse(text: string): string {
    slugger.reset();
    return marked.parse(text);
  };
})();
