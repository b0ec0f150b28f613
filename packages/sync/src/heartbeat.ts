/**
 * Heartbeat ping sent after each completed run
 */

import { fetch } from "undici";
import type { Logger } from "@org-backup/shared";

export const HEARTBEAT_TIMEOUT_MS = 10_000;

/**
 * Sends a GET to url; never throws
 */
export async function sendHeartbeat(
    url: string | undefined,
    logger: Logger,
    timeoutMs: number = HEARTBEAT_TIMEOUT_MS
): Promise<boolean> {
    if (!url) {
        logger.debug("No heartbeat URL configured.");
        return false;
    }

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), timeoutMs);
    try {
        const response = await fetch(url, { method: "GET", signal: controller.signal });
        // Drain the body so the connection can be reused or closed
        await response.arrayBuffer();
        if (response.status === 200) {
            logger.info("Heartbeat ping sent successfully.");
            return true;
        }
        logger.warn(`Heartbeat ping returned status code: ${response.status}`);
        return false;
    } catch (error) {
        const message =
            error instanceof Error && error.name === "AbortError"
                ? `request aborted after ${timeoutMs}ms`
                : error instanceof Error
                  ? error.message
                  : String(error);
        logger.error(`Failed to send heartbeat ping: ${message}`);
        return false;
    } finally {
        clearTimeout(timer);
    }
}
