/**
 * Provision Engine — Installer Adapter Tests
 *
 * Adapters run against a fake CommandRunner; nothing is installed.
 */

import { describe, it, expect } from "vitest";
import { getInstaller, getSupportedManagers, isManagerType } from "../src/installers";
import { BREW_ENV } from "../src/installers/brew-installer";
import { parseCargoInstallList } from "../src/installers/cargo-installer";
import { goBinaryName, goModulePath } from "../src/installers/go-installer";
import { ensureVirtualenv } from "../src/installers/pip-installer";
import {
  categorizeFailure,
  classifyFailure,
  summarizeOutput,
} from "../src/installers/classify";
import { ProvisionError } from "../src/errors";
import { fakeRunner } from "./helpers";

describe("installer registry", () => {
  it("knows every bundled package manager", () => {
    expect(getSupportedManagers().sort()).toEqual([
      "brew",
      "cargo",
      "cask",
      "go",
      "npm",
      "pip",
      "vscode",
    ]);
    expect(isManagerType("cask")).toBe(true);
    expect(isManagerType("apt")).toBe(false);
  });

  it("throws on an unknown manager", () => {
    expect(() => getInstaller("apt")).toThrow(ProvisionError);
    expect(() => getInstaller("apt")).toThrow('package manager "apt"');
  });
});

describe("BrewFormulaInstaller", () => {
  it("checks presence with brew list and the no-update env", async () => {
    const { runner, calls } = fakeRunner({ "brew list --formula jq": {} });
    const brew = getInstaller("brew", { runner });

    expect(await brew.isPresent({ id: "jq" })).toBe(true);
    expect(calls[0]).toEqual({
      file: "brew",
      args: ["list", "--formula", "jq"],
      env: BREW_ENV,
    });
  });

  it("reports an unknown formula as a terminal failure", async () => {
    const { runner } = fakeRunner({
      "brew install nope": {
        exitCode: 1,
        stderr: 'Warning: No available formula with the name "nope".\n',
      },
    });
    const brew = getInstaller("brew", { runner });

    const result = await brew.install({ id: "nope" });

    expect(result).toEqual({
      success: false,
      failure: {
        reason: 'Warning: No available formula with the name "nope".',
        alreadyExists: false,
        retryable: false,
        exitCode: 1,
      },
    });
  });
});

describe("BrewCaskInstaller", () => {
  it("installs without quarantine", async () => {
    const { runner, calls } = fakeRunner({
      "brew install --cask --no-quarantine iterm2": {},
    });
    const cask = getInstaller("cask", { runner });

    expect(await cask.install({ id: "iterm2" })).toEqual({ success: true });
    expect(calls[0].args).toEqual(["install", "--cask", "--no-quarantine", "iterm2"]);
  });

  it("flags an app that is already in /Applications", async () => {
    const { runner } = fakeRunner({
      "brew install --cask --no-quarantine firefox": {
        exitCode: 1,
        stderr:
          "==> Installing Cask firefox\nError: It seems there is already an App at '/Applications/Firefox.app'.\n",
      },
    });
    const cask = getInstaller("cask", { runner });

    const result = await cask.install({ id: "firefox" });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.failure.alreadyExists).toBe(true);
      expect(result.failure.reason).toBe(
        "Error: It seems there is already an App at '/Applications/Firefox.app'.",
      );
    }
  });
});

describe("NpmGlobalInstaller", () => {
  it("installs the source when one is given", async () => {
    const { runner, calls } = fakeRunner({});
    const npm = getInstaller("npm", { runner });

    await npm.install({ id: "tsc", source: "typescript" });

    expect(calls[0]).toEqual({
      file: "npm",
      args: ["install", "-g", "typescript"],
      env: undefined,
    });
  });

  it("treats a missing npm binary as terminal", async () => {
    const { runner } = fakeRunner({
      "npm install -g pnpm": { exitCode: 127, stderr: "npm: command not found" },
    });
    const npm = getInstaller("npm", { runner });

    const result = await npm.install({ id: "pnpm" });

    expect(result).toEqual({
      success: false,
      failure: {
        reason: "npm: command not found",
        alreadyExists: false,
        retryable: false,
        exitCode: 127,
      },
    });
  });
});

describe("PipInstaller", () => {
  it("uses the configured pip executable", async () => {
    const { runner, calls } = fakeRunner({
      "/venv/bin/pip show --quiet black": {},
    });
    const pip = getInstaller("pip", { runner, pipCommand: "/venv/bin/pip" });

    expect(await pip.isPresent({ id: "black" })).toBe(true);
    await pip.install({ id: "black" });
    expect(calls[1].args).toEqual(["install", "black", "--no-cache-dir"]);
  });
});

describe("ensureVirtualenv", () => {
  it("reuses an existing environment", async () => {
    const { runner, calls } = fakeRunner({ "/v/bin/pip --version": {} });

    const venv = await ensureVirtualenv("/v", { runner });

    expect(venv).toEqual({ dir: "/v", pip: "/v/bin/pip", created: false });
    expect(calls).toHaveLength(1);
  });

  it("creates the environment and upgrades its pip", async () => {
    const { runner, calls } = fakeRunner({ "python3 -m venv /v": {} });

    const venv = await ensureVirtualenv("/v", { runner });

    expect(venv.created).toBe(true);
    expect(calls.map((c) => [c.file, ...c.args].join(" "))).toEqual([
      "/v/bin/pip --version",
      "python3 -m venv /v",
      "/v/bin/pip install --upgrade pip",
    ]);
  });

  it("fails when the interpreter cannot create it", async () => {
    const { runner } = fakeRunner({
      "python3.12 -m venv /v": { exitCode: 1, stderr: "Error: ensurepip is not available" },
    });

    await expect(ensureVirtualenv("/v", { runner, python: "python3.12" })).rejects.toThrow(
      new ProvisionError(
        "VIRTUALENV_FAILED",
        "Could not create a virtualenv at /v: Error: ensurepip is not available",
      ),
    );
  });
});

describe("CargoInstaller", () => {
  const listing = [
    "bat v0.24.0:",
    "    bat",
    "ripgrep v14.1.0:",
    "    rg",
    "tool v0.1.0 (/home/me/src/tool):",
    "    tool",
  ].join("\n");

  it("parses crate names from cargo install --list", () => {
    expect(parseCargoInstallList(listing)).toEqual(["bat", "ripgrep", "tool"]);
  });

  it("matches crate names, not binary names", async () => {
    const { runner } = fakeRunner({
      "cargo install --list": { stdout: listing },
    });
    const cargo = getInstaller("cargo", { runner });

    expect(await cargo.isPresent({ id: "ripgrep" })).toBe(true);
    expect(await cargo.isPresent({ id: "rg" })).toBe(false);
  });

  it("treats an existing binary from another crate as already present", async () => {
    const { runner } = fakeRunner({
      "cargo install bat": {
        exitCode: 101,
        stderr: "error: binary `bat` already exists in destination\n",
      },
    });
    const cargo = getInstaller("cargo", { runner });

    const result = await cargo.install({ id: "bat" });

    expect(result.success === false && result.failure.alreadyExists).toBe(true);
  });
});

describe("GoInstaller", () => {
  it("appends @latest to versionless module paths", () => {
    expect(goModulePath({ id: "gopls", source: "golang.org/x/tools/gopls" })).toBe(
      "golang.org/x/tools/gopls@latest",
    );
    expect(goModulePath({ id: "x", source: "example.com/x@v1.2.0" })).toBe(
      "example.com/x@v1.2.0",
    );
  });

  it("derives the binary name from the module path", () => {
    expect(goBinaryName({ id: "gopls", source: "golang.org/x/tools/gopls@latest" })).toBe(
      "gopls",
    );
    expect(goBinaryName({ id: "tool", source: "example.com/tool/v2" })).toBe("tool");
    expect(goBinaryName({ id: "dlv", source: "example.com/cmd/x", label: "dlv" })).toBe(
      "dlv",
    );
  });

  it("checks presence on PATH and installs the module", async () => {
    const { runner, calls } = fakeRunner({
      "go install golang.org/x/tools/gopls@latest": {},
    });
    const go = getInstaller("go", { runner });
    const target = { id: "gopls", source: "golang.org/x/tools/gopls" };

    expect(await go.isPresent(target)).toBe(false);
    expect(await go.install(target)).toEqual({ success: true });
    expect(calls.map((c) => [c.file, ...c.args].join(" "))).toEqual([
      "which gopls",
      "go install golang.org/x/tools/gopls@latest",
    ]);
  });
});

describe("VscodeExtensionInstaller", () => {
  it("compares extension ids case-insensitively", async () => {
    const { runner } = fakeRunner({
      "code --list-extensions": {
        stdout: "esbenp.prettier-vscode\ngithub.copilot\n",
      },
    });
    const vscode = getInstaller("vscode", { runner });

    expect(await vscode.isPresent({ id: "GitHub.copilot" })).toBe(true);
    expect(await vscode.isPresent({ id: "ms-python.python" })).toBe(false);
  });

  it("reports not-present when the code CLI is missing", async () => {
    const { runner } = fakeRunner({
      "code --list-extensions": { exitCode: 127 },
    });
    const vscode = getInstaller("vscode", { runner });

    expect(await vscode.isPresent({ id: "github.copilot" })).toBe(false);
  });
});

describe("classifyFailure", () => {
  it("treats network errors as retryable", () => {
    const failure = classifyFailure({
      exitCode: 1,
      stdout: "",
      stderr: "curl: (6) Could not resolve host: ghcr.io\n",
    });
    expect(failure.retryable).toBe(true);
    expect(failure.alreadyExists).toBe(false);
  });

  it("treats a brew lock as retryable", () => {
    const failure = classifyFailure({
      exitCode: 1,
      stdout: "",
      stderr: "Error: Another active Homebrew process is already in progress.",
    });
    expect(failure.retryable).toBe(true);
  });

  it("treats permission errors as terminal", () => {
    const failure = classifyFailure({
      exitCode: 243,
      stdout: "",
      stderr: "npm error code EACCES",
    });
    expect(failure.retryable).toBe(false);
  });

  it("treats an already-installed warning as present", () => {
    const failure = classifyFailure({
      exitCode: 1,
      stdout: "",
      stderr: "Warning: jq 1.7.1 is already installed",
    });
    expect(failure).toEqual({
      reason: "Warning: jq 1.7.1 is already installed",
      alreadyExists: true,
      retryable: false,
      exitCode: 1,
    });
  });

  it("treats a missing version as terminal", () => {
    const failure = classifyFailure({
      exitCode: 1,
      stdout: "",
      stderr: "npm error notarget No matching version found for vite@99",
    });
    expect(failure.retryable).toBe(false);
    expect(failure.alreadyExists).toBe(false);
    expect(categorizeFailure({ exitCode: 1, stdout: "", stderr: "HTTP/1.1 404 Not Found" }).category).toBe(
      "not_found",
    );
  });

  it("treats an externally managed interpreter as terminal", () => {
    const result = {
      exitCode: 1,
      stdout: "",
      stderr: "error: externally-managed-environment\n\n× This environment is externally managed",
    };
    expect(categorizeFailure(result).category).toBe("externally_managed");
    expect(classifyFailure(result).retryable).toBe(false);
  });

  it("retries output it does not recognize", () => {
    const failure = classifyFailure({ exitCode: 2, stdout: "", stderr: "" });
    expect(failure).toEqual({
      reason: "exited with code 2",
      alreadyExists: false,
      retryable: true,
      exitCode: 2,
    });
  });
});

describe("summarizeOutput", () => {
  it("prefers the last stderr line", () => {
    expect(
      summarizeOutput({ exitCode: 1, stdout: "out", stderr: "first\nlast\n\n" }),
    ).toBe("last");
  });

  it("falls back to stdout", () => {
    expect(summarizeOutput({ exitCode: 1, stdout: "  only stdout  ", stderr: "\n" })).toBe(
      "only stdout",
    );
  });
});
