import { ConsoleLogger, SilentLogger } from "./logger";

let stderr: jest.SpyInstance;
let stdout: jest.SpyInstance;

beforeEach(() => {
  stderr = jest.spyOn(process.stderr, "write").mockImplementation(() => true);
  stdout = jest.spyOn(process.stdout, "write").mockImplementation(() => true);
});

afterEach(() => {
  jest.restoreAllMocks();
});

test("ConsoleLogger writes warnings by default", () => {
  const logger = new ConsoleLogger();
  logger.debug("hidden");
  expect(stderr).not.toHaveBeenCalled();

  logger.warn("Populating a large lookup table", { size: 65537 });
  expect(stderr).toHaveBeenCalledTimes(1);
  expect(stderr).toHaveBeenCalledWith(
    "[alphabet-range] warn: Populating a large lookup table size=65537\n"
  );
  expect(stdout).not.toHaveBeenCalled();
});

test("ConsoleLogger at debug level", () => {
  const logger = new ConsoleLogger("debug", "test");
  logger.debug("Cached index for symbol", { symbol: "c", index: 2 });
  logger.debug("Built index map");
  expect(stderr.mock.calls).toEqual([
    ['[test] debug: Cached index for symbol symbol="c" index=2\n'],
    ["[test] debug: Built index map\n"],
  ]);
});

test("ConsoleLogger at silent level writes nothing", () => {
  const logger = new ConsoleLogger("silent");
  logger.debug("nothing");
  logger.warn("nothing");
  expect(stderr).not.toHaveBeenCalled();
});

test("SilentLogger writes nothing", () => {
  const logger = new SilentLogger();
  logger.debug();
  logger.warn();
  expect(stderr).not.toHaveBeenCalled();
  expect(stdout).not.toHaveBeenCalled();
});
