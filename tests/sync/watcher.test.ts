import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { readFileSync } from "fs";
import { ContactStore } from "../../src/contacts/store.js";
import { ParseError } from "../../src/errors.js";
import { FileWatcher } from "../../src/sync/watcher.js";
import { FIXED_NOW, TempNotes, frontmatter, makeSettings, tempNotes } from "../helpers.js";

describe("FileWatcher", () => {
  let notes: TempNotes;
  let watcher: FileWatcher;

  beforeEach(() => {
    notes = tempNotes();
    watcher = new FileWatcher(
      new ContactStore(makeSettings({ notesDirectory: notes.dir }), { now: () => FIXED_NOW })
    );
  });

  afterEach(async () => {
    await watcher.stop();
    notes.cleanup();
  });

  it("schedules reminders for a changed contact", () => {
    const jane = notes.write(
      "jane.md",
      frontmatter(["title: Jane Doe", "tags: [person]", 'CONTACT_BIRTHDAY: "1985-03-15"'])
    );
    const scheduled = vi.fn();
    watcher.on("scheduled", scheduled);

    watcher.handleFileChange(jane);

    expect(scheduled).toHaveBeenCalledWith(jane, {
      status: "scheduled",
      created: ["Jane Doe's birthday in 7 days", "Jane Doe's birthday"],
    });
    expect(readFileSync(jane, "utf-8")).toContain("## TODO Jane Doe's birthday\n");
  });

  it("emits errors instead of throwing", () => {
    const bob = notes.write("bob.md", frontmatter(["title: Bob", "tags: [person]", "CONTACT_BIRTHDAY: later"]));
    const errors = vi.fn();
    watcher.on("error", errors);

    watcher.handleFileChange(bob);

    expect(errors).toHaveBeenCalledTimes(1);
    expect(errors.mock.calls[0][0]).toBeInstanceOf(ParseError);
    expect(errors.mock.calls[0][1]).toBe(bob);
  });

  it("ignores files that are not markdown", () => {
    const text = notes.write("notes.txt", "hello\n");
    const scheduled = vi.fn();
    watcher.on("scheduled", scheduled);

    watcher.handleFileChange(text);

    expect(scheduled).not.toHaveBeenCalled();
    expect(readFileSync(text, "utf-8")).toBe("hello\n");
  });

  it("is not running until started", () => {
    expect(watcher.isRunning()).toBe(false);
  });
});
