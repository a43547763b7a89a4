import path from "node:path";
import { describe, expect, it } from "vitest";
import { resolveCompileOutput } from "../src/commands/compile.js";

const agentDir = path.join("agents", "sales_agent");

describe("resolveCompileOutput", () => {
  it("defers to the remembered path without output options", () => {
    expect(resolveCompileOutput({}, "sales_agent", agentDir)).toBeUndefined();
  });

  it("prefers an explicit output path", () => {
    expect(
      resolveCompileOutput(
        { output: "build/out.py", outputDir: "ignored" },
        "sales_agent",
        agentDir
      )
    ).toBe("build/out.py");
  });

  it("builds the file from a directory and a name", () => {
    expect(
      resolveCompileOutput({ outputDir: "build" }, "sales_agent", agentDir)
    ).toBe(path.join("build", "sales_agent_fabric.py"));
    expect(
      resolveCompileOutput({ outputName: "notebook" }, "sales_agent", agentDir)
    ).toBe(path.join(agentDir, "notebook.py"));
    expect(
      resolveCompileOutput(
        { outputDir: "build", outputName: "notebook.py" },
        "sales_agent",
        agentDir
      )
    ).toBe(path.join("build", "notebook.py"));
  });
});
