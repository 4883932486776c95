import { printNextStepInfo } from "./hints";

/**
 * The staged tree is itself the raw export; nothing is run.
 */
export function exportRaw(stagedDir: string): string {
	console.log(`Files exported at: "${stagedDir}"`);
	printNextStepInfo(stagedDir);
	return stagedDir;
}
