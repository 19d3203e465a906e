import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import * as cons from "./console";

describe("console log file", () => {
  let tempRoot: string;

  beforeEach(() => {
    tempRoot = fs.mkdtempSync(path.join(os.tmpdir(), "deploystamp-console-"));
  });

  afterEach(() => {
    cons.setLogFile(null);
    fs.rmSync(tempRoot, { recursive: true, force: true });
  });

  it("truncates the file and writes one line per message with its level", () => {
    const logPath = path.join(tempRoot, "run.log");
    fs.writeFileSync(logPath, "stale\n", "utf-8");

    cons.setLogFile(logPath);
    cons.info("copying");
    cons.warning("skipped");
    cons.error("failed");

    const lines = fs.readFileSync(logPath, "utf-8").trimEnd().split("\n");
    expect(lines).toHaveLength(3);
    expect(lines[0]).toMatch(/^\[\d{4}-\d{2}-\d{2}T[^\]]+Z\] \[INFO\] copying$/);
    expect(lines[1]).toMatch(/\] \[WARNING\] skipped$/);
    expect(lines[2]).toMatch(/\] \[ERROR\] failed$/);
    expect(cons.getLogFile()).toBe(logPath);
  });

  it("stops writing once the log file is cleared", () => {
    const logPath = path.join(tempRoot, "run.log");
    cons.setLogFile(logPath);
    cons.setLogFile(null);
    cons.info("not logged");

    expect(fs.readFileSync(logPath, "utf-8")).toBe("");
    expect(cons.getLogFile()).toBeNull();
  });
});
