import fs from "node:fs";
import path from "node:path";
import pino from "pino";

function createLogger(): pino.Logger {
	const options: pino.LoggerOptions = {
		level: process.env.LOG_LEVEL ?? "info",
		base: { service: "momentum-bot" },
		timestamp: pino.stdTimeFunctions.isoTime,
	};

	const logFile = process.env.LOG_FILE;
	if (!logFile) {
		return pino(options);
	}

	fs.mkdirSync(path.dirname(logFile), { recursive: true });
	const destination = pino.destination({ dest: logFile, sync: false });
	return pino(
		options,
		pino.multistream([{ stream: process.stdout }, { stream: destination }]),
	);
}

export const logger = createLogger();
