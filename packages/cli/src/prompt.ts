/**
 * Interactive prompts
 */

import inquirer from 'inquirer';
import { SwitchError } from '@binswap/registry';
import type { ListRow } from '@binswap/registry';

/**
 * Let the user pick one of an application's tags; the active tag is preselected
 */
export async function pickTag(appName: string, rows: ListRow[], message: string): Promise<string> {
  if (rows.length === 0) {
    throw new SwitchError('UnknownApplication', `Application ${appName} isn't tracked`, { appName });
  }

  const active = rows.find((row) => row.isActive);
  const { tag } = await inquirer.prompt<{ tag: string }>([
    {
      type: 'list',
      name: 'tag',
      message,
      choices: rows.map((row) => ({
        name: `${row.isActive ? '*' : ' '} ${row.tag} - ${row.summary}`,
        value: row.tag,
      })),
      default: active?.tag,
    },
  ]);
  return tag;
}

export async function confirm(message: string): Promise<boolean> {
  const { confirmed } = await inquirer.prompt<{ confirmed: boolean }>([
    {
      type: 'confirm',
      name: 'confirmed',
      message,
      default: false,
    },
  ]);
  return confirmed;
}
