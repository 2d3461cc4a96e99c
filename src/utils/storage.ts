import fs from "node:fs/promises";
import path from "node:path";

/** Parsed JSON document, or undefined when the file does not exist. */
export async function readJson(filePath: string): Promise<unknown> {
	let content: string;
	try {
		content = await fs.readFile(filePath, "utf8");
	} catch (err: unknown) {
		if (isErrnoException(err) && err.code === "ENOENT") {
			return undefined;
		}
		throw err;
	}
	return JSON.parse(content);
}

let tempCounter = 0;

/**
 * Writes to a sibling temp file, fsyncs it, then renames it over `filePath`.
 * Readers see either the previous document or the new one.
 */
export async function writeJsonAtomic(
	filePath: string,
	data: unknown,
): Promise<void> {
	await fs.mkdir(path.dirname(filePath), { recursive: true });
	tempCounter += 1;
	const tempPath = `${filePath}.${process.pid}.${tempCounter}.tmp`;

	const handle = await fs.open(tempPath, "w");
	try {
		await handle.writeFile(JSON.stringify(data, null, 2), "utf8");
		await handle.sync();
	} finally {
		await handle.close();
	}

	try {
		await fs.rename(tempPath, filePath);
	} catch (err) {
		await fs.rm(tempPath, { force: true });
		throw err;
	}
}

/** Temp files left beside `filePath` by a write that never reached its rename. */
export async function findOrphanedTempFiles(filePath: string): Promise<string[]> {
	const dir = path.dirname(filePath);
	const prefix = `${path.basename(filePath)}.`;
	let entries: string[];
	try {
		entries = await fs.readdir(dir);
	} catch (err: unknown) {
		if (isErrnoException(err) && err.code === "ENOENT") return [];
		throw err;
	}
	return entries
		.filter((name) => name.startsWith(prefix) && name.endsWith(".tmp"))
		.map((name) => path.join(dir, name));
}

export async function appendLine(
	filePath: string,
	line: string,
): Promise<void> {
	await fs.mkdir(path.dirname(filePath), { recursive: true });
	await fs.appendFile(filePath, `${line}\n`, "utf8");
}

export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
	return err instanceof Error && "code" in err;
}
