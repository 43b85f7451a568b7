import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { main } from "../src/cli/mod.js";
import { VERSION } from "../src/config.js";
import { captureLogs, FakeSupervisor, makeTempDir, removeDir, writeTree } from "./helpers.js";

let tmp: string;
let source: string;
let out: string[];
let logs: ReturnType<typeof captureLogs>;
let supervisor: FakeSupervisor;
let dirs: string[];

beforeEach(async () => {
  tmp = await makeTempDir();
  source = join(tmp, "myapp");
  out = [];
  logs = captureLogs();
  supervisor = new FakeSupervisor();
  dirs = [
    "--units-dir",
    join(tmp, "units"),
    "--base-path",
    join(tmp, "srv"),
    "--state-dir",
    join(tmp, "state"),
  ];

  await writeTree(source, {
    "quadlets/main.container": "[Container]\nImage={{ image }}\n",
    "config.d/main/app.conf": "greeting={{ greeting }}\n",
  });
});

afterEach(async () => {
  logs.restore();
  await removeDir(tmp);
});

function run(argv: string[]): Promise<number> {
  return main(argv, { out: (line) => out.push(line), createSupervisor: () => supervisor });
}

describe("cli", () => {
  it("prints the version", async () => {
    expect(await run(["--version"])).toBe(0);
    expect(out).toEqual([`quadlet-deploy v${VERSION}`]);
  });

  it("prints help without a command", async () => {
    expect(await run([])).toBe(0);
    expect(out[0]?.startsWith("quadlet-deploy - Deploy Podman Quadlet applications")).toBe(true);
  });

  it("prints command help", async () => {
    expect(await run(["plan", "--help"])).toBe(0);
    expect(out[0]?.startsWith("Usage: quadlet-deploy plan <src>")).toBe(true);
  });

  it("rejects unknown commands", async () => {
    expect(await run(["bogus"])).toBe(1);
    expect(logs.lines).toEqual(["Unknown command: bogus"]);
    expect(await run(["constructor"])).toBe(1);
  });

  it("plans with variables from a file and the command line", async () => {
    await writeTree(tmp, { "vars.json": JSON.stringify({ image: "nginx:1.27", greeting: "hi" }) });

    const code = await run(["plan", source, ...dirs, "--vars", join(tmp, "vars.json"), "-e", "greeting=hello"]);

    expect(code).toBe(0);
    expect(out).toEqual([
      `~ ${join(tmp, "units", "myapp--main.container")}`,
      `~ ${tmp}/srv/myapp/config/main/app.conf`,
      "myapp: changes pending",
    ]);
  });

  it("shows rendered content of changed files", async () => {
    await run(["plan", source, ...dirs, "-e", "image=nginx", "-e", "greeting=hi", "--show"]);
    expect(out).toEqual([
      `~ ${join(tmp, "units", "myapp--main.container")}`,
      "[Container]\nContainerName=myapp--main\nImage=nginx",
      `~ ${tmp}/srv/myapp/config/main/app.conf`,
      "greeting=hi",
      "myapp: changes pending",
    ]);
  });

  it("deploys and reports the result as JSON", async () => {
    const code = await run(["deploy", source, ...dirs, "-e", "image=nginx", "-e", "greeting=hi", "--state", "started", "--json"]);

    expect(code).toBe(0);
    expect(supervisor.calls).toEqual(["verify", "reload", "start myapp--main.service"]);

    const parsed: unknown = JSON.parse(out.join("\n"));
    expect(parsed).toMatchObject({
      changed: true,
      applicationName: "myapp",
      message: "quadlet files deployed and service started",
    });
  });

  it("skips the generator check when asked", async () => {
    await run(["deploy", source, ...dirs, "-e", "image=nginx", "-e", "greeting=hi", "--skip-verify"]);
    expect(supervisor.calls).toEqual(["reload"]);
    expect(out[0]).toBe("changed: quadlet files deployed");
  });

  it("maps errors to exit codes", async () => {
    expect(await run(["plan", join(tmp, "missing"), ...dirs])).toBe(2);
    expect(await run(["plan", source, ...dirs])).toBe(3);
    expect(await run(["deploy", source, ...dirs, "--state", "running"])).toBe(8);
    expect(await run(["deploy", ...dirs])).toBe(8);
    expect(await run(["plan", source, ...dirs, "-e", "novalue"])).toBe(8);
    expect(await run(["plan", source, "--units-dir", "relative"])).toBe(8);
  });

  it("explains malformed variable assignments", async () => {
    expect(await run(["plan", source, ...dirs, "-e", "novalue"])).toBe(8);
    expect(logs.lines).toEqual([
      "plan failed: ConfigError: Invalid variable assignment (expected NAME=VALUE): novalue",
    ]);
  });

  it("prints secrets from the store", async () => {
    const secrets = join(tmp, "secrets");
    await writeTree(secrets, {
      "secrets.json": JSON.stringify({ nameToID: { "myapp-db_password": "id1" } }),
      "filedriver/secretsdata.json": JSON.stringify({ id1: "dGVzdC1zZWNyZXQ=" }),
    });

    expect(await run(["secret", "myapp", "db_password", "--secrets-dir", secrets])).toBe(0);
    expect(out).toEqual(["test-secret"]);
    expect(await run(["secret", "myapp", "missing", "--secrets-dir", secrets])).toBe(7);
  });
});
