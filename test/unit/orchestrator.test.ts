import { expect } from "chai";
import { readFileSync } from "node:fs";
import { readFile } from "node:fs/promises";
import * as path from "node:path";
import type { NotesGenerator } from "../../src/core/changelog.js";
import type { ReleaseOptions } from "../../src/core/options.js";
import { runRelease } from "../../src/core/orchestrator.js";
import { PreconditionError, ToolInvocationError } from "../../src/types/errors.js";
import { FakeRepo } from "../helpers/fake-repo.js";

const notes: NotesGenerator = async (input) => `## ${input.version}\n\n* changes\n`;

function options(overrides: Partial<ReleaseOptions> = {}): ReleaseOptions {
  return { level: "patch", rc: 0, publish: false, verbose: false, ...overrides };
}

async function rejectionOf(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (err) {
    return err;
  }
  return expect.fail("expected the run to fail");
}

describe("runRelease", () => {
  let repo: FakeRepo;

  afterEach(async () => {
    await repo.dispose();
  });

  it("dry run: commits locally, builds the artifact and pushes nothing", async () => {
    repo = await FakeRepo.create();
    const result = await runRelease(options(), repo.session(), { generateNotes: notes });
    const out = path.join(repo.root, "release-artifacts");

    expect(repo.runner.lines()).to.deep.equal([
      "git fetch --tags origin",
      "git status --porcelain --untracked-files=no",
      "git rev-parse --abbrev-ref HEAD",
      "git rev-parse --verify HEAD^{commit}",
      "git rev-parse --verify --quiet refs/tags/widget-1.2.3",
      "git rev-parse --verify --quiet refs/tags/widget-1.2.3-rc0",
      "git rev-parse --verify --quiet refs/heads/1.2.3-rc0",
      "git tag --list widget-* --merged HEAD --sort=-v:refname",
      "git log --format=%H\x1f%B\x1e HEAD",
      "git remote get-url origin",
      "git add -- CHANGELOG.md",
      "git commit -m Update CHANGELOG.md for 1.2.3",
      "git add -- VERSION",
      "git commit -m Prepare next development version 1.2.4-SNAPSHOT",
      "git checkout -b 1.2.3-rc0",
      "git add -- VERSION",
      "git commit -m Set version 1.2.3 for release candidate 1.2.3-rc0",
      "git rev-parse --verify HEAD^{commit}",
      `git archive --format=tar.gz --prefix=widget-1.2.3/ --output=${path.join(out, "widget-1.2.3.tar.gz")} 1.2.3-rc0`,
      "gpg --batch --yes --armor --output widget-1.2.3.tar.gz.asc --detach-sign widget-1.2.3.tar.gz",
      "git remote get-url origin",
      "git rev-parse --abbrev-ref HEAD",
      "git checkout main",
    ]);

    expect(result.startSha).to.equal("sha-0");
    expect(result.commitSha).to.equal("sha-3");
    expect(result.published).to.equal(undefined);
    expect(repo.branch).to.equal("main");
    expect(repo.branches.has("1.2.3-rc0")).to.equal(true);
    expect(repo.tags.size).to.equal(0);
    expect(result.messageFile).to.equal(path.join(out, "widget-1.2.3-rc0.vote.txt"));
    expect(await readFile(result.messageFile, "utf8")).to.equal(result.message);
    expect(await readFile(path.join(out, "widget-1.2.3.tar.gz.sha512"), "utf8")).to.match(
      /^[0-9a-f]{128} {2}widget-1\.2\.3\.tar\.gz\n$/,
    );
  });

  it("the vote email carries the rc version, commit hash and closing date", async () => {
    repo = await FakeRepo.create();
    const { message } = await runRelease(options({ rc: 2 }), repo.session(), {
      generateNotes: notes,
    });
    expect(message).to.contain("Subject: [VOTE] Release Widget 1.2.3 rc2\n");
    expect(message).to.contain('* the tag "widget-1.2.3-rc2" [2]\n');
    expect(message).to.contain("* commit hash sha-3\n");
    expect(message).to.contain("until Thu, 05 Mar 2026 09:30:00 GMT.\n");
    expect(message).to.contain("[2] https://github.com/example/widget/tree/widget-1.2.3-rc2\n");
  });

  it("publish: one tag push and one push of main to its after-release ref", async () => {
    repo = await FakeRepo.create({ publish: true });
    const result = await runRelease(options({ publish: true, level: "minor" }), repo.session(), {
      generateNotes: notes,
    });
    expect(result.calc.newSnapshotVersion).to.equal("1.3.0-SNAPSHOT");
    expect(result.published).to.deep.equal({
      distDirUrl: "https://dist.example.org/repos/dist/dev/widget/widget-1.2.3-rc0",
      mainAfterRef: "main-after-widget-1.2.3-rc0",
    });
    expect(repo.runner.linesStartingWith("git push")).to.deep.equal([
      "git push origin widget-1.2.3-rc0",
      "git push origin main:main-after-widget-1.2.3-rc0",
    ]);
    expect(repo.runner.linesStartingWith("svn mkdir")).to.have.length(1);
    expect(repo.tags.has("widget-1.2.3-rc0")).to.equal(true);
    expect(repo.branch).to.equal("main");
  });

  it("writes the snapshot on main and the release version on the staging branch", async () => {
    repo = await FakeRepo.create();
    const markers: string[] = [];
    repo.runner.on("git add -- VERSION", () => {
      markers.push(`${repo.branch}:${readMarkerSync(repo)}`);
      return {};
    });
    await runRelease(options({ level: "major" }), repo.session(), { generateNotes: notes });
    expect(markers).to.deep.equal(["main:2.0.0-SNAPSHOT", "1.2.3-rc0:1.2.3"]);
  });

  it("aborts before any mutation when a tag already exists", async () => {
    repo = await FakeRepo.create({ existingTags: ["widget-1.2.3"] });
    const err = await rejectionOf(runRelease(options(), repo.session(), { generateNotes: notes }));
    expect(err).to.be.instanceOf(PreconditionError);
    expect(repo.runner.linesStartingWith("git commit")).to.deep.equal([]);
    expect(repo.runner.linesStartingWith("git checkout")).to.deep.equal([]);
    expect(repo.logger.failures).to.deep.equal([]);
  });

  it("prints rollback advice when signing fails and returns to main", async () => {
    repo = await FakeRepo.create();
    repo.runner.on("gpg", { exitCode: 2, stderr: "gpg: no default secret key" });
    const err = await rejectionOf(runRelease(options(), repo.session(), { generateNotes: notes }));
    expect(err).to.be.instanceOf(ToolInvocationError);
    expect(repo.logger.failures).to.have.length(1);
    expect(repo.logger.failures[0]).to.contain("  git reset --hard sha-0\n");
    expect(repo.logger.failures[0]).to.contain("  git branch -D 1.2.3-rc0");
    expect(repo.runner.linesStartingWith("git push")).to.deep.equal([]);
    expect(repo.branch).to.equal("main");
  });

  it("warns when the original branch cannot be restored", async () => {
    repo = await FakeRepo.create();
    repo.runner.on("gpg", { exitCode: 2 });
    repo.runner.on("git checkout main", { exitCode: 1, stderr: "error: local changes would be overwritten" });
    await rejectionOf(runRelease(options(), repo.session(), { generateNotes: notes }));
    expect(repo.logger.warnings).to.deep.equal([
      "could not switch back to main: `git checkout main` exited with 1: error: local changes would be overwritten",
    ]);
  });
});

function readMarkerSync(repo: FakeRepo): string {
  return readFileSync(path.join(repo.root, "VERSION"), "utf8").trim();
}
