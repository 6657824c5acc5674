import { CommandSuggestion } from "@/types/global";

export const COMMAND_PREFIX = "/";

const command = (
  name: string,
  aliases: string[],
  argHint: string | null,
  description: string,
): CommandSuggestion => ({ command: name, aliases, argHint, description });

export const BASE_COMMANDS: readonly CommandSuggestion[] = [
  command("/block", [], "[nickname]", "block or list blocked peers"),
  command("/channels", [], null, "show joined channels"),
  command("/clear", [], null, "clear chat messages"),
  command("/hug", [], "<nickname>", "send someone a warm hug"),
  command("/j", ["/join"], "<channel> [password]", "join or create a channel"),
  command("/leave", ["/part"], "[channel]", "leave a channel"),
  command("/m", ["/msg"], "<nickname> [message]", "send private message"),
  command("/slap", [], "<nickname>", "slap someone with a trout"),
  command("/unblock", [], "<nickname>", "unblock a peer"),
  command("/w", [], null, "see who's online"),
  // Emergency swarm commands
  command(
    "/role",
    [],
    "<scout|medic|leader|helper|analyst>",
    "set your emergency role",
  ),
  command("/supply", [], "<item>", "broadcast supply need/availability"),
  command("/emergency", [], "<message>", "broadcast emergency alert"),
  command("/status", [], null, "show swarm status and capabilities"),
];

export const AI_COMMANDS: readonly CommandSuggestion[] = [
  command("/ai", [], "<message>", "chat with AI assistant"),
  command("/analyze", [], "<situation>", "AI analysis of situation"),
  command("/ai-status", [], null, "check emergency AI readiness"),
  command("/ai-help", [], null, "show AI command help"),
  command("/autorespond", [], "[on|off]", "toggle automatic AI replies"),
];

// Only offered while a channel is current
export const CHANNEL_COMMANDS: readonly CommandSuggestion[] = [
  command("/pass", [], "<password>", "change channel password"),
];

export type RegistryContext = {
  currentChannel: string | null;
};

export function allCommands(context: RegistryContext): CommandSuggestion[] {
  const channelCommands = context.currentChannel ? CHANNEL_COMMANDS : [];
  return [...BASE_COMMANDS, ...AI_COMMANDS, ...channelCommands];
}

/**
 * Look up a command by its name or one of its aliases (case-sensitive).
 */
export function findCommand(
  token: string,
  context: RegistryContext,
): CommandSuggestion | undefined {
  return allCommands(context).find(
    (c) => c.command === token || c.aliases.includes(token),
  );
}

/**
 * Autocomplete: commands whose name or alias starts with the input,
 * case-insensitively, sorted by command name.
 */
export function suggest(
  partialInput: string,
  context: RegistryContext,
): CommandSuggestion[] {
  if (!partialInput.startsWith(COMMAND_PREFIX)) return [];

  const input = partialInput.toLowerCase();
  return allCommands(context)
    .filter(
      (c) =>
        c.command.startsWith(input) ||
        c.aliases.some((alias) => alias.startsWith(input)),
    )
    .sort((a, b) =>
      a.command < b.command ? -1 : a.command > b.command ? 1 : 0,
    );
}

/** Text placed in the input box when a suggestion is picked. */
export function selectSuggestion(suggestion: CommandSuggestion): string {
  return `${suggestion.command} `;
}

/** Usage line, shown under the name the user typed (an alias included). */
export function usageOf(
  suggestion: CommandSuggestion,
  name: string = suggestion.command,
): string {
  return suggestion.argHint
    ? `usage: ${name} ${suggestion.argHint}`
    : `usage: ${name}`;
}
