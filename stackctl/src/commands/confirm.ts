import { confirm, isCancel } from "@clack/prompts";

/** y/n prompt on the terminal; Ctrl-C counts as "no". */
export async function confirmPrompt(message: string): Promise<boolean> {
  const answer = await confirm({ message, initialValue: false });
  if (isCancel(answer)) return false;
  return answer;
}
