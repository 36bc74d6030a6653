/**
 * Render worker as a child process
 *
 * Invoked as `<command...> <url> <waitSelector|""> <timeoutMs>`. stdout is the
 * final HTML, stderr carries logs and side-channel blocks.
 */

import { spawn } from "node:child_process";
import { RENDER_CONSTANTS } from "../constants";
import { AppConfig } from "../config/app-config";
import { ConfigurationError } from "../errors";
import { errorCode } from "../fetch/transport";
import { RenderBridge, UnconfiguredRenderer, type ProcessArgs, type ProcessOutput, type RenderProcess, type Renderer } from "./bridge";

/** Splits a command line on whitespace, honouring double quotes. */
export function splitCommand(command: string): string[] {
  const parts = command.match(/"[^"]*"|\S+/g) ?? [];
  return parts.map((p) => p.replace(/^"|"$/g, ""));
}

export class SubprocessRenderProcess implements RenderProcess {
  private readonly argv: string[];
  private readonly interactiveArgv: string[];

  constructor(
    command: string,
    interactiveCommand = "",
    private readonly graceMs: number = RENDER_CONSTANTS.PROCESS_GRACE_MS,
  ) {
    this.argv = splitCommand(command);
    this.interactiveArgv = interactiveCommand ? splitCommand(interactiveCommand) : this.argv;
    if (this.argv.length === 0) {
      throw new ConfigurationError("render command is empty");
    }
  }

  run(args: ProcessArgs): Promise<ProcessOutput> {
    const [bin, ...fixed] = args.interactions ? this.interactiveArgv : this.argv;
    const argv = [...fixed, args.url, args.waitHint, String(args.timeoutMs)];

    return new Promise<ProcessOutput>((resolve, reject) => {
      const child = spawn(bin, argv, { stdio: ["ignore", "pipe", "pipe"] });
      const stdout: Buffer[] = [];
      const stderr: Buffer[] = [];
      let timedOut = false;

      const timer = setTimeout(() => {
        timedOut = true;
        child.kill("SIGKILL");
      }, args.timeoutMs + this.graceMs);

      child.stdout.on("data", (d: Buffer) => stdout.push(d));
      child.stderr.on("data", (d: Buffer) => stderr.push(d));

      child.on("error", (error) => {
        clearTimeout(timer);
        if (errorCode(error) === "ENOENT" || errorCode(error) === "EACCES") {
          reject(new ConfigurationError(`render executable not runnable: ${bin}`, { cause: error }));
          return;
        }
        resolve({
          exitCode: null,
          stdout: "",
          stderr: error.message,
          timedOut: false,
        });
      });

      child.on("close", (code) => {
        clearTimeout(timer);
        resolve({
          exitCode: code,
          stdout: Buffer.concat(stdout).toString("utf8"),
          stderr: Buffer.concat(stderr).toString("utf8"),
          timedOut,
        });
      });
    });
  }
}

/** Renderer wired from configuration; a missing command defers the error to first use. */
export function createRenderer(command = AppConfig.RENDER_COMMAND): Renderer {
  if (!command.trim()) return new UnconfiguredRenderer();
  return new RenderBridge(
    new SubprocessRenderProcess(command, AppConfig.RENDER_INTERACTIVE_COMMAND),
  );
}
