import { describeRevert } from '../../contract/src/index.js';

export function banner(text: string): void {
    const line = '='.repeat(60);
    console.log(`\n${line}`);
    console.log(`  ${text}`);
    console.log(`${line}\n`);
}

export function section(text: string): void {
    console.log(`\n${text}`);
    console.log('-'.repeat(text.length));
}

/** Entry-point failure handler shared by every script. */
export function fatal(context: string, err: unknown): never {
    console.error(`\nFATAL ERROR during ${context}:\n`);
    console.error(`  ${describeRevert(err)}`);
    process.exit(1);
}
