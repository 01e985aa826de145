import { describe, expect, test } from "vitest";
import { passwordCommand } from "../../../src/commands/password.ts";
import { buildTopology } from "../../../src/core/topology.ts";
import { DockerError, NotFoundError } from "../../../src/types/errors.ts";
import { createTestContext } from "../../helpers/test-helpers.ts";

function withApp(running: boolean) {
  const ctx = createTestContext();
  ctx.docker.seed(buildTopology(ctx.config).app, running);
  return ctx;
}

describe("passwordCommand", () => {
  test("runs change-password for the configured admin", async () => {
    const ctx = withApp(true);
    const commands: string[][] = [];
    ctx.docker.execHandler = (_name, command) => {
      commands.push(command);
      return { exitCode: 0, stdout: "", stderr: "" };
    };

    await passwordCommand(ctx, "new-secret");

    expect(commands).toEqual([
      [
        "python3",
        "-m",
        "faraday.manage",
        "change-password",
        "--username",
        "faraday",
        "--password",
        "new-secret",
      ],
    ]);
    expect(ctx.out).toContain("✓ Password changed for faraday");
  });

  test("accepts another username", async () => {
    const ctx = withApp(true);

    await passwordCommand(ctx, "new-secret", { username: "analyst" });

    expect(ctx.out).toContain("✓ Password changed for analyst");
  });

  test("surfaces a failed change", async () => {
    const ctx = withApp(true);
    ctx.docker.execHandler = () => ({ exitCode: 1, stdout: "", stderr: "User not found\n" });

    await expect(passwordCommand(ctx, "new-secret")).rejects.toThrow(
      "Failed to change password for faraday: User not found",
    );
  });

  test("requires a running application", async () => {
    const ctx = withApp(false);

    await expect(passwordCommand(ctx, "new-secret")).rejects.toBeInstanceOf(DockerError);
  });

  test("requires an installed application", async () => {
    const ctx = createTestContext();

    await expect(passwordCommand(ctx, "new-secret")).rejects.toBeInstanceOf(NotFoundError);
  });
});
