// pattern: Functional Core

export { runCommand, aboutText, HELP_TEXT, type CommandContext, type CommandResult } from "./commands.js";
export { promptSearchRequest, parseObjective, toSearchRequest, objectiveMenu, type Ask, type Write } from "./form.js";
