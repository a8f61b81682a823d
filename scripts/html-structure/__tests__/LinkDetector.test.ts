import { describe, expect, it } from "vitest";
import { LinkDetector, isStylesheetLink } from "../LinkDetector";
import type { TagEvent } from "../types";

const position = { offset: 0, line: 1, column: 1 };

const link = (attributes: Record<string, string>, name: string = "link"): TagEvent => ({
  kind: "start",
  name,
  attributes: new Map(Object.entries(attributes)),
  selfClosing: false,
  position
});

describe("isStylesheetLink", () => {
  it.each([
    [{ rel: "stylesheet", href: "style.css" }, true],
    [{ href: "style.css" }, true],
    [{ rel: "alternate stylesheet", href: "Theme.CSS?v=2" }, true],
    [{ rel: "STYLESHEET", href: " css/style.css#top " }, true],
    [{ rel: "icon", href: "favicon.ico" }, false],
    [{ rel: "icon", href: "style.css" }, false],
    [{ rel: "", href: "style.css" }, false],
    [{ rel: "stylesheet" }, false],
    [{ rel: "stylesheet", href: "style.css.map" }, false]
  ])("%o -> %s", (attributes, expected) => {
    expect(isStylesheetLink(new Map(Object.entries(attributes)))).toBe(expected);
  });
});

describe("LinkDetector", () => {
  it("is satisfied by any stylesheet link in the stream", () => {
    const detector = new LinkDetector();
    detector.consume(link({ rel: "icon", href: "favicon.ico" }));
    detector.consume(link({ href: "style.css" }));
    detector.consume(link({ rel: "icon", href: "other.ico" }));
    expect(detector.finish()).toEqual([]);
  });

  it("reports a missing stylesheet link", () => {
    const detector = new LinkDetector();
    detector.consume(link({ rel: "icon", href: "favicon.ico" }));
    detector.consume(link({ href: "style.css" }, "a"));
    detector.consume({ kind: "end", name: "link", position });
    expect(detector.finish()).toEqual([{ code: "no-css-link" }]);
  });
});
