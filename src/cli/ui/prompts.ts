import { password } from '@inquirer/prompts';

export async function promptToken(message = 'GitHub API token'): Promise<string> {
  const value = await password({
    message,
    mask: '*',
    validate: (v) => (v.trim().length > 0 ? true : 'A token is required'),
  });
  return value.trim();
}
