import winston from 'winston';
import dotenv from 'dotenv';

dotenv.config();

const { combine, timestamp, printf, colorize } = winston.format;

const myFormat = printf(({ level, message, timestamp }) => {
    return `${timestamp} [${level}]: ${message}`;
});

const transports: winston.transport[] = [new winston.transports.Console()];
if (process.env.BUILDFIX_LOG_FILE) {
    transports.push(new winston.transports.File({ filename: process.env.BUILDFIX_LOG_FILE }));
}

export const logger = winston.createLogger({
    level: process.env.LOG_LEVEL || 'info',
    format: combine(
        timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
        colorize(),
        myFormat
    ),
    transports,
});
