import { describe, test, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as path from "path";
import * as os from "os";
import { FileStorage, MemoryStorage } from "./storage";

describe("storage", () => {
	describe("FileStorage", () => {
		let tempDir: string;

		beforeEach(() => {
			tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "recstore-storage-"));
		});

		afterEach(() => {
			fs.rmSync(tempDir, { recursive: true, force: true });
		});

		test("write and read", () => {
			const storage = new FileStorage();
			const file = path.join(tempDir, "data.json");
			storage.write(file, '{"users":[]}');
			expect(storage.read(file)).toBe('{"users":[]}');
		});

		test("read of a missing file is null", () => {
			expect(new FileStorage().read(path.join(tempDir, "missing.json"))).toBeNull();
		});

		test("read of a directory is null", () => {
			expect(new FileStorage().read(tempDir)).toBeNull();
		});

		test("write creates parent directories", () => {
			const storage = new FileStorage();
			const file = path.join(tempDir, "nested", "deeper", "data.json");
			storage.write(file, "{}");
			expect(fs.readFileSync(file, "utf-8")).toBe("{}");
		});

		test("write replaces previous content and leaves no temp file", () => {
			const storage = new FileStorage();
			const file = path.join(tempDir, "data.json");
			storage.write(file, '{"a":[{"x":1},{"x":2}]}');
			storage.write(file, "{}");

			expect(fs.readFileSync(file, "utf-8")).toBe("{}");
			expect(fs.readdirSync(tempDir)).toEqual(["data.json"]);
		});

		test("write onto a directory fails and cleans up its temp file", () => {
			const storage = new FileStorage();
			const target = path.join(tempDir, "occupied");
			fs.mkdirSync(path.join(target, "child"), { recursive: true });

			expect(() => storage.write(target, "{}")).toThrow();
			expect(fs.readdirSync(tempDir)).toEqual(["occupied"]);
		});

		test("a failed temp write surfaces its own error and leaves foreign paths alone", () => {
			const storage = new FileStorage();
			const target = path.join(tempDir, "data.json");
			const tempPath = `${target}.${process.pid}.tmp`;
			fs.mkdirSync(tempPath);

			let caught: unknown;
			try {
				storage.write(target, "{}");
			} catch (err) {
				caught = err;
			}
			expect(caught).toMatchObject({ code: "EISDIR" });
			expect(fs.statSync(tempPath).isDirectory()).toBe(true);
			expect(fs.existsSync(target)).toBe(false);
		});
	});

	describe("MemoryStorage", () => {
		test("unknown location reads as null", () => {
			const storage = new MemoryStorage();
			expect(storage.read("data.json")).toBeNull();
			expect(storage.has("data.json")).toBe(false);
		});

		test("keeps written content per location", () => {
			const storage = new MemoryStorage({ "a.json": "{}" });
			storage.write("b.json", '{"t":[]}');

			expect(storage.read("a.json")).toBe("{}");
			expect(storage.contents("b.json")).toBe('{"t":[]}');
			expect(storage.has("b.json")).toBe(true);
		});
	});
});
