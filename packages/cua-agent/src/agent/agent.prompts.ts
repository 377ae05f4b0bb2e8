import {
  formatShortcut,
  getKeyboardInfo,
  getPlatform,
  getPlatformDisplayName,
  Platform,
} from '@cua/shared';
import * as os from 'os';
import { AgentTool } from '../tools';
import { TASK_CONTEXT_PLACEHOLDER } from './agent.constants';

export interface SystemPromptOptions {
  platform?: Platform;
  arch?: string;
  tools: readonly AgentTool[];
}

function shortcutTable(platform: Platform): string {
  const keyboard = getKeyboardInfo(platform);
  return Object.values(keyboard.shortcuts)
    .map(
      (shortcut) =>
        `• ${shortcut.description}: ${formatShortcut(shortcut.key, shortcut.modifiers)}`,
    )
    .join('\n');
}

function toolList(tools: readonly AgentTool[]): string {
  return tools.map((tool) => `• ${tool.name}: ${tool.description}`).join('\n');
}

/**
 * System prompt for the ReAct loop. The returned template still contains
 * the task-context placeholder; fill it each turn with
 * {@link renderSystemPrompt}.
 */
export const buildSystemPrompt = ({
  platform = getPlatform(),
  arch = os.arch(),
  tools,
}: SystemPromptOptions): string => {
  const keyboard = getKeyboardInfo(platform);
  const launcher = keyboard.appLauncher;

  return `
You are a careful computer-use agent operating the user's ${getPlatformDisplayName(platform)} desktop (${arch}).

════════════════════════════════
PLATFORM
════════════════════════════════
• Primary modifier: ${keyboard.primaryModifier}. Secondary modifier: ${keyboard.secondaryModifier}.
• App launcher: ${launcher.name}. ${launcher.openMethod} (key_press key "${launcher.key}"${launcher.modifiers.length > 0 ? ` with modifiers ${JSON.stringify(launcher.modifiers)}` : ''}).
• Common shortcuts:
${shortcutTable(platform)}

════════════════════════════════
HOW TO WORK (ReAct)
════════════════════════════════
1. Observe: take a screenshot before your first action and after anything that changes the screen.
2. Think: describe what you see and decide the single next action.
3. Act: call exactly ONE tool per turn.
4. Verify: check the result in the next observation before moving on.
• Prefer the keyboard (launcher, shortcuts, tab, enter) over clicking when it is reliable.
• Use find_element to locate controls by role or name when the accessibility tree is available.
• Coordinates may be pixels of the latest screenshot or normalized 0-1000 values across the screen.
• If an action fails, do not repeat it unchanged. Try a different approach.
• Call complete_task with a short summary once the task is done and verified.
• Call need_help when you cannot make progress (missing credentials, CAPTCHA, repeated failures).

════════════════════════════════
TOOLS
════════════════════════════════
${toolList(tools)}

════════════════════════════════
TASK CONTEXT
════════════════════════════════
${TASK_CONTEXT_PLACEHOLDER}
`.trim();
};

export function renderSystemPrompt(template: string, taskContext: string): string {
  return template.split(TASK_CONTEXT_PLACEHOLDER).join(taskContext);
}
