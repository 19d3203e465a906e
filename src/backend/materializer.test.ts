import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { materializeTemplate } from "./materializer";

describe("materializeTemplate", () => {
  let tempRoot: string;
  let sourceDir: string;

  beforeEach(() => {
    tempRoot = fs.mkdtempSync(path.join(os.tmpdir(), "deploystamp-copy-"));
    sourceDir = path.join(tempRoot, "src");
    fs.mkdirSync(path.join(sourceDir, "conf", "extra"), { recursive: true });
    fs.mkdirSync(path.join(sourceDir, "empty"));
    fs.writeFileSync(path.join(sourceDir, "config.yaml"), "replicas: 2\n", "utf-8");
    fs.writeFileSync(path.join(sourceDir, "main.tf.j2"), "region = \"{{ region }}\"\n", "utf-8");
    fs.writeFileSync(path.join(sourceDir, "conf", "extra", "payload.bin"), Buffer.from([0, 255, 1, 128]));
  });

  afterEach(() => {
    fs.rmSync(tempRoot, { recursive: true, force: true });
  });

  it("copies the whole tree verbatim, including template files", () => {
    const dest = path.join(tempRoot, "out", "deep", "app");

    const copied = materializeTemplate(sourceDir, dest);

    expect(copied).toBe(3);
    expect(fs.readFileSync(path.join(dest, "config.yaml"), "utf-8")).toBe("replicas: 2\n");
    expect(fs.readFileSync(path.join(dest, "main.tf.j2"), "utf-8")).toBe("region = \"{{ region }}\"\n");
    expect([...fs.readFileSync(path.join(dest, "conf", "extra", "payload.bin"))]).toEqual([0, 255, 1, 128]);
    expect(fs.statSync(path.join(dest, "empty")).isDirectory()).toBe(true);
  });

  it("overwrites existing files and keeps unrelated ones", () => {
    const dest = path.join(tempRoot, "out");
    fs.mkdirSync(dest, { recursive: true });
    fs.writeFileSync(path.join(dest, "config.yaml"), "replicas: 9\n", "utf-8");
    fs.writeFileSync(path.join(dest, "keep.txt"), "mine", "utf-8");

    materializeTemplate(sourceDir, dest);

    expect(fs.readFileSync(path.join(dest, "config.yaml"), "utf-8")).toBe("replicas: 2\n");
    expect(fs.readFileSync(path.join(dest, "keep.txt"), "utf-8")).toBe("mine");
  });

  it("follows symbolic links to files and directories", () => {
    const shared = path.join(tempRoot, "shared");
    fs.mkdirSync(shared);
    fs.writeFileSync(path.join(shared, "lib.txt"), "shared lib", "utf-8");
    fs.writeFileSync(path.join(tempRoot, "outside.txt"), "outside", "utf-8");
    fs.symlinkSync(shared, path.join(sourceDir, "linked-dir"), "dir");
    fs.symlinkSync(path.join(tempRoot, "outside.txt"), path.join(sourceDir, "linked.txt"));
    const dest = path.join(tempRoot, "out");

    const copied = materializeTemplate(sourceDir, dest);

    expect(copied).toBe(5);
    expect(fs.lstatSync(path.join(dest, "linked-dir")).isSymbolicLink()).toBe(false);
    expect(fs.lstatSync(path.join(dest, "linked-dir")).isDirectory()).toBe(true);
    expect(fs.readFileSync(path.join(dest, "linked-dir", "lib.txt"), "utf-8")).toBe("shared lib");
    expect(fs.lstatSync(path.join(dest, "linked.txt")).isSymbolicLink()).toBe(false);
    expect(fs.readFileSync(path.join(dest, "linked.txt"), "utf-8")).toBe("outside");
  });

  it("propagates errors for a missing source", () => {
    expect(() => materializeTemplate(path.join(tempRoot, "nope"), path.join(tempRoot, "out"))).toThrow();
  });
});
