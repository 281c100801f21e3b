/**
 * Slack Configuration Checker
 * 
 * Logs warnings at startup for settings that are valid but likely unintended.
 * It doesn't prevent the app from running.
 */

import type { BridgeSettings } from "../config/settings";
import { SLACK_EVENTS_PATH } from "../slack";

export function checkSlackConfiguration(settings: BridgeSettings): string[] {
    const warnings: string[] = [];
    const { triggers, slack } = settings;

    if (triggers.modes.size === 0) {
        warnings.push("BOT_TRIGGER_MODES is empty - the bot will never answer");
    }
    if (triggers.modes.has("keyword") && triggers.keywords.length === 0) {
        warnings.push("BOT_TRIGGER_KEYWORDS is empty - keyword listening will never trigger");
    }
    if (triggers.modes.has("keyword") && triggers.autoReplyChannels.size === 0) {
        warnings.push("AUTO_REPLY_CHANNELS is empty - keyword listening is active in every channel the bot is in");
    }
    if (slack.challengeBeforeVerify) {
        warnings.push("SLACK_CHALLENGE_BEFORE_VERIFY is on - url_verification is answered without a signature check");
    }
    if (!settings.gemini.fallbackEnabled) {
        warnings.push("QUERY_FALLBACK_ENABLED is off - backend failures are reported to users directly");
    }

    console.log("\n=== Slack Bridge Configuration Check ===");
    console.log(`✓ Events endpoint: POST ${SLACK_EVENTS_PATH}`);
    console.log(`✓ Trigger modes: ${Array.from(triggers.modes).join(", ") || "none"}`);
    for (const warning of warnings) {
        console.warn(`⚠️  ${warning}`);
    }
    console.log("=".repeat(40) + "\n");

    return warnings;
}
