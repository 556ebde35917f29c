/**
 * Notification Pusher
 *
 * Sends the proposed command to a phone through KDE Connect so it can be
 * read before the second confirmation. Best-effort.
 */

import { spawn, type ChildProcess } from "node:child_process";
import type { NotifySettings } from "../types.js";

export interface CommandNotifier {
  push(commandText: string): Promise<boolean>;
}

export function buildNotificationArgs(commandText: string, device?: string): string[] {
  const args = ["--send-notification", `Command: ${commandText}`];
  if (device) {
    args.push("--device", device);
  }
  return args;
}

export class KdeConnectNotifier implements CommandNotifier {
  private device?: string;
  private binary: string;

  constructor(settings: Pick<NotifySettings, "device">, binary: string = "kdeconnect-cli") {
    this.device = settings.device;
    this.binary = binary;
  }

  push(commandText: string): Promise<boolean> {
    return new Promise((resolve) => {
      let child: ChildProcess;
      try {
        child = spawn(this.binary, buildNotificationArgs(commandText, this.device), {
          stdio: ["ignore", "ignore", "pipe"],
        });
      } catch (error) {
        console.warn(
          `Error sending KDE Connect notification: ${error instanceof Error ? error.message : String(error)}`
        );
        resolve(false);
        return;
      }

      let stderr = "";
      let failedToStart = false;
      child.stderr?.on("data", (data: Buffer) => {
        stderr += data.toString();
      });

      child.on("close", (code) => {
        if (failedToStart) return;
        if (code === 0) {
          console.log("Command pushed to phone for inspection.");
          resolve(true);
        } else {
          console.warn(`Error sending KDE Connect notification: ${stderr.trim() || `exit code ${code}`}`);
          resolve(false);
        }
      });

      child.on("error", (error) => {
        failedToStart = true;
        console.warn(`Error sending KDE Connect notification: ${error.message}`);
        resolve(false);
      });
    });
  }
}

export function createNotifier(settings: NotifySettings): CommandNotifier | undefined {
  return settings.enabled ? new KdeConnectNotifier(settings) : undefined;
}
