import { describe, expect, it } from "vitest";
import { formatMountRule, parseMountRule, type PreprocessContext, preprocessUnit } from "../src/core/preprocessor.js";
import { createUnitDescriptor } from "../src/core/quadlet.js";
import { PreprocessError } from "../src/utils/errors.js";

const context: PreprocessContext = {
  appName: "myapp",
  basePath: "/srv",
  unitBaseNames: new Set(["main", "db", "data", "net"]),
};

function run(fileName: string, text: string) {
  return preprocessUnit(createUnitDescriptor(fileName, text), context);
}

describe("preprocessUnit", () => {
  it("substitutes paths, prefixes references and injects the name", () => {
    const result = run(
      "main.container",
      `[Unit]
Requires=db.service
After=db.service network-online.target

[Container]
Image=nginx
Volume=init.d:/docker-entrypoint-initdb.d
Volume=config.d/nginx.conf:/etc/nginx/nginx.conf:Z
Volume=data.volume:/var/lib/data
Network=net.network
`,
    );

    expect(result.content).toBe(`[Unit]
Requires=myapp--db.service
After=myapp--db.service network-online.target

[Container]
ContainerName=myapp--main
Image=nginx
Volume=/srv/myapp/init/main:/docker-entrypoint-initdb.d:ro
Volume=/srv/myapp/config/main/nginx.conf:/etc/nginx/nginx.conf:Z
Volume=myapp--data.volume:/var/lib/data
Network=myapp--net.network
`);
    expect(result.injected).toEqual({ key: "ContainerName", value: "myapp--main" });
    expect(result.mounts).toEqual([
      { source: "/srv/myapp/init/main", target: "/docker-entrypoint-initdb.d", options: ["ro"], area: "init" },
      { source: "/srv/myapp/config/main/nginx.conf", target: "/etc/nginx/nginx.conf", options: ["Z"], area: "config" },
    ]);
  });

  it("keeps explicit access modes on init mounts", () => {
    const result = run("db.container", "[Container]\nVolume=init.d/scripts/:/init:rw\nVolume=init.d\n");
    expect(result.content).toBe(
      "[Container]\nContainerName=myapp--db\nVolume=/srv/myapp/init/db/scripts:/init:rw\nVolume=/srv/myapp/init/db\n",
    );
  });

  it("rejects sources that leave the payload directory", () => {
    expect(() => run("main.container", "[Container]\nVolume=config.d/../secrets:/x\n")).toThrow(PreprocessError);
  });

  it("does not prefix twice", () => {
    const text = "[Unit]\nRequires=myapp--db.service\n\n[Container]\nContainerName=custom\nNetwork=myapp--net.network\n";
    const result = run("main.container", text);

    expect(result.content).toBe(text);
    expect(result.injected).toBeUndefined();
    expect(result.references).toEqual([
      { directive: "Requires", raw: "myapp--db.service", resolved: "myapp--db.service" },
      { directive: "Network", raw: "myapp--net.network", resolved: "myapp--net.network" },
    ]);
  });

  it("prefixes bare unit names but not foreign resources", () => {
    const result = run("main.container", "[Container]\nContainerName=web\nNetwork=net\nPod=host\nVolume=pgdata:/var/lib/pg\n");
    expect(result.content).toBe(
      "[Container]\nContainerName=web\nNetwork=myapp--net\nPod=host\nVolume=pgdata:/var/lib/pg\n",
    );
  });

  it("leaves specifiers and host paths alone", () => {
    const text = "[Unit]\nWants=%N-helper.service\n\n[Container]\nContainerName=web\nVolume=/etc/localtime:/etc/localtime:ro\n";
    expect(run("main.container", text).content).toBe(text);
  });

  it("names volumes and networks", () => {
    expect(run("data.volume", "[Volume]\n").content).toBe("[Volume]\nVolumeName=myapp--data\n");
    expect(run("net.network", "[Unit]\nDescription=net\n").content).toBe(
      "[Unit]\nDescription=net\n\n[Network]\nNetworkName=myapp--net\n",
    );
  });

  it("does not inject names into kube units", () => {
    const result = run("stack.kube", "[Kube]\nYaml=stack.yaml\n");
    expect(result.content).toBe("[Kube]\nYaml=stack.yaml\n");
    expect(result.injected).toBeUndefined();
  });
});

describe("mount rules", () => {
  it("splits source, target and options", () => {
    expect(parseMountRule("a:/b:ro,Z")).toEqual({ source: "a", target: "/b", options: ["ro", "Z"] });
    expect(parseMountRule("a")).toEqual({ source: "a", options: [] });
    expect(formatMountRule({ source: "/x", target: "/y", options: [] })).toBe("/x:/y");
    expect(formatMountRule({ source: "/x", target: "/y", options: ["ro"] })).toBe("/x:/y:ro");
  });
});
