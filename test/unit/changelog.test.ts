import { expect } from "chai";
import {
  findPreviousRelease,
  prependNotes,
  semanticReleaseNotes,
} from "../../src/core/changelog.js";
import { Git } from "../../src/core/git.js";
import { FakeRunner } from "../helpers/fake-runner.js";

describe("changelog", () => {
  describe("findPreviousRelease", () => {
    it("skips rc tags and takes the newest final release", () => {
      const runner = new FakeRunner().on("git tag --list", {
        stdout: "widget-1.3.0-rc1\nwidget-1.3.0-rc0\nwidget-1.2.9\nwidget-1.2.8\n",
      });
      expect(findPreviousRelease(new Git(runner, "/repo"), "widget")).to.equal("widget-1.2.9");
    });

    it("ignores tags of a longer prefix", () => {
      const runner = new FakeRunner().on("git tag --list", {
        stdout: "widget-extras-2.0.0\n",
      });
      expect(findPreviousRelease(new Git(runner, "/repo"), "widget")).to.equal(undefined);
    });

    it("returns undefined for a first release", () => {
      expect(findPreviousRelease(new Git(new FakeRunner(), "/repo"), "widget")).to.equal(undefined);
    });
  });

  describe("prependNotes", () => {
    it("puts new notes above the existing changelog", () => {
      expect(prependNotes("## 1.2.2\n\n* old\n", "## 1.2.3\n\n* new\n\n")).to.equal(
        "## 1.2.3\n\n* new\n\n## 1.2.2\n\n* old\n",
      );
    });

    it("creates the changelog from scratch", () => {
      expect(prependNotes("", "## 1.0.0\n")).to.equal("## 1.0.0\n");
    });
  });

  describe("semanticReleaseNotes", () => {
    it("groups conventional commits by type", async function () {
      this.timeout(10000);
      const notes = await semanticReleaseNotes({
        cwd: process.cwd(),
        commits: [
          { hash: "a".repeat(40), message: "fix(parser): handle empty input" },
          { hash: "b".repeat(40), message: "feat: add streaming reader" },
        ],
        previousTag: "widget-1.2.2",
        version: "1.2.3",
        releaseTag: "widget-1.2.3",
        repositoryUrl: "https://github.com/example/widget.git",
      });
      expect(notes).to.contain("### Bug Fixes");
      expect(notes).to.contain("**parser:** handle empty input");
      expect(notes).to.contain("### Features");
      expect(notes).to.contain("add streaming reader");
      expect(notes).to.contain("https://github.com/example/widget/compare/widget-1.2.2...widget-1.2.3");
    });

    for (const remote of ["/srv/git/widget.git", "../widget.git"]) {
      it(`renders notes for a clone of the local repository ${remote}`, async function () {
        this.timeout(10000);
        const notes = await semanticReleaseNotes({
          cwd: process.cwd(),
          commits: [{ hash: "c".repeat(40), message: "fix: keep trailing newline" }],
          version: "1.2.3",
          releaseTag: "widget-1.2.3",
          repositoryUrl: remote,
        });
        expect(notes).to.contain("### Bug Fixes");
        expect(notes).to.contain("keep trailing newline");
      });
    }
  });
});
