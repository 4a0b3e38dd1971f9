import * as uuid from 'uuid';
import * as fsPromises from 'fs/promises';
import * as path from 'path';

export function dbg(s: string) {
    console.debug(s);
}

export function say(s: string) {
    console.log(s);
}

/**
 * Generates a fresh identifier, used for conversations, plans, steps and scenarios.
 */
export function newId(): string {
    return uuid.v4();
}

export function nowIso(): string {
    return new Date().toISOString();
}

/**
 * Persists the given content to a file in the specified directory with the specified filename.
 * 
 * @param content - The string content to save to file.
 * @param outputDir - The directory path where the output file should be created.
 * @param outputFileName - The name of the file to be created (e.g., 'business_plan.md').
 * @param resolveFn - Function to resolve file paths (defaults to path.resolve).
 * @param writeFileFn - Function to write files (defaults to fs.promises.writeFile).
 * @throws Logs error and re-throws it to allow the caller to handle it.
 */
export async function persistOutput(
    content: string,
    outputDir: string,
    outputFileName: string,
    resolveFn: (...paths: string[]) => string = path.resolve,
    writeFileFn: (file: string, data: string, encoding: BufferEncoding) => Promise<void> = fsPromises.writeFile
): Promise<void> {
    const outputPath = resolveFn(outputDir, outputFileName);
    try {
        await writeFileFn(outputPath, content || "", 'utf-8');
        say(`Output saved to: ${outputPath}`);
    } catch (error) {
        console.error(`Error saving output to ${outputPath}:`, error);
        throw error;
    }
}

/**
 * Extracts a readable message from anything thrown.
 */
export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
