export { Logger, type ILogObj } from "tslog";
export {
	createLogger,
	createJsonLogger,
	createSilentLogger,
	DEFAULT_LOGGER_NAME,
	type AppLogObj,
	type LogMode,
} from "./logger";
