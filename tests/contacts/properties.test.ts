import { describe, it, expect, vi } from "vitest";
import {
  getBirthday,
  getContactName,
  getLabeledValues,
  getTags,
  isContactDocument,
  readContact,
} from "../../src/contacts/properties.js";
import { ParseError } from "../../src/errors.js";
import { contactDocument, makeSettings } from "../helpers.js";

const KEY = "CONTACT_BIRTHDAY";

function withFields(...fields: string[]) {
  return contactDocument({ fields });
}

describe("getBirthday", () => {
  it("reads a quoted date", () => {
    expect(getBirthday(withFields('CONTACT_BIRTHDAY: "1985-03-15"'), KEY)).toEqual(new Date(1985, 2, 15));
  });

  it("reads an unquoted YAML date as a local date", () => {
    expect(getBirthday(withFields("CONTACT_BIRTHDAY: 1985-03-15"), KEY)).toEqual(new Date(1985, 2, 15));
  });

  it("reads an unquoted YAML timestamp as wall-clock time", () => {
    expect(getBirthday(withFields("CONTACT_BIRTHDAY: 1985-03-15 14:30:00"), KEY)).toEqual(
      new Date(1985, 2, 15, 14, 30)
    );
  });

  it("reads a quoted date with a time", () => {
    expect(getBirthday(withFields('CONTACT_BIRTHDAY: "1985-03-15 14:30"'), KEY)).toEqual(
      new Date(1985, 2, 15, 14, 30)
    );
  });

  it("reads a timestamp value", () => {
    expect(getBirthday(withFields('CONTACT_BIRTHDAY: "<1985-03-15 Fri>"'), KEY)).toEqual(
      new Date(1985, 2, 15)
    );
  });

  it("places a month and day without a year in the leap placeholder year", () => {
    expect(getBirthday(withFields('CONTACT_BIRTHDAY: "03-15"'), KEY)).toEqual(new Date(2000, 2, 15));
    expect(getBirthday(withFields("CONTACT_BIRTHDAY: --02-29"), KEY)).toEqual(new Date(2000, 1, 29));
    expect(() => getBirthday(withFields('CONTACT_BIRTHDAY: "02-30"'), KEY)).toThrow(ParseError);
  });

  it("throws a ParseError naming the document and property", () => {
    const doc = withFields('CONTACT_BIRTHDAY: "not a date"');

    expect(() => getBirthday(doc, KEY)).toThrow(
      'Invalid CONTACT_BIRTHDAY in /contacts/jane.md: "not a date" is not a date'
    );
    try {
      getBirthday(doc, KEY);
    } catch (error) {
      expect(error).toBeInstanceOf(ParseError);
      expect(error).toMatchObject({ documentPath: "/contacts/jane.md", property: KEY });
    }
  });

  it("rejects empty, numeric and impossible values", () => {
    expect(() => getBirthday(withFields("CONTACT_BIRTHDAY:"), KEY)).toThrow('"" is not a date');
    expect(() => getBirthday(withFields("CONTACT_BIRTHDAY: 1985"), KEY)).toThrow('"1985" is not a date');
    expect(() => getBirthday(withFields('CONTACT_BIRTHDAY: "1985-02-30"'), KEY)).toThrow(ParseError);
  });
});

describe("getContactName", () => {
  it("trims the title", () => {
    expect(getContactName(withFields("title: '  Jane Doe '"))).toBe("Jane Doe");
  });

  it("accepts numeric titles", () => {
    expect(getContactName(withFields("title: 42"))).toBe("42");
  });

  it("treats a blank or missing title as no name", () => {
    expect(getContactName(withFields("title: '   '"))).toBeUndefined();
    expect(getContactName(withFields("tags: [person]"))).toBeUndefined();
  });
});

describe("getTags", () => {
  it("reads lists and separated strings", () => {
    expect(getTags(withFields("tags: [person, 42]"))).toEqual(["person", "42"]);
    expect(getTags(withFields("tags: person, friend"))).toEqual(["person", "friend"]);
    expect(getTags(withFields("tags: ':person:friend:'"))).toEqual(["person", "friend"]);
    expect(getTags(withFields("title: Jane"))).toEqual([]);
  });
});

describe("getLabeledValues", () => {
  it("reads a list of label/value maps", () => {
    const doc = withFields(
      "CONTACT_EMAILS:",
      "  - label: home",
      "    value: jane@example.com",
      "  - value: j@work.example"
    );
    expect(getLabeledValues(doc, "CONTACT_EMAILS")).toEqual([
      { label: "home", value: "jane@example.com" },
      { label: "", value: "j@work.example" },
    ]);
  });

  it("reads a list of labeled strings", () => {
    const doc = withFields('CONTACT_PHONES: ["mobile: 555 0100", "555 0199"]');
    expect(getLabeledValues(doc, "CONTACT_PHONES")).toEqual([
      { label: "mobile", value: "555 0100" },
      { label: "", value: "555 0199" },
    ]);
  });

  it("reads the parenthesized pair form", () => {
    const doc = withFields(`CONTACT_EMAILS: '("home" "jane@example.com") ("work" . "say \\"hi\\"")'`);
    expect(getLabeledValues(doc, "CONTACT_EMAILS")).toEqual([
      { label: "home", value: "jane@example.com" },
      { label: "work", value: 'say "hi"' },
    ]);
  });

  it("reads a single value", () => {
    expect(getLabeledValues(withFields("CONTACT_ADDRESSES: 1 Main St"), "CONTACT_ADDRESSES")).toEqual([
      { label: "", value: "1 Main St" },
    ]);
  });

  it("returns nothing for a missing property", () => {
    expect(getLabeledValues(withFields("title: Jane"), "CONTACT_ADDRESSES")).toEqual([]);
  });
});

describe("isContactDocument", () => {
  const settings = makeSettings();

  it("requires the contact tag", () => {
    expect(isContactDocument(contactDocument(), settings)).toBe(true);
    expect(isContactDocument(withFields("title: Jane", "tags: [friend]"), settings)).toBe(false);
  });

  it("requires the document to live under the contacts directory", () => {
    expect(isContactDocument(contactDocument({ filePath: "/contacts/people/jane.md" }), settings)).toBe(true);
    expect(isContactDocument(contactDocument({ filePath: "/elsewhere/jane.md" }), settings)).toBe(false);
    expect(isContactDocument(contactDocument({ filePath: "/contacts-archive/jane.md" }), settings)).toBe(
      false
    );
  });

  it("uses the configured tag", () => {
    expect(isContactDocument(contactDocument(), makeSettings({ contactTag: "friend" }))).toBe(false);
  });
});

describe("readContact", () => {
  const settings = makeSettings();

  it("builds a contact from the managed properties", () => {
    const doc = withFields(
      "title: Jane Doe",
      "tags: [person]",
      'CONTACT_BIRTHDAY: "1985-03-15"',
      'CONTACT_EMAILS: ["home: jane@example.com"]'
    );

    expect(readContact(doc, settings)).toEqual({
      filePath: "/contacts/jane.md",
      name: "Jane Doe",
      birthday: new Date(1985, 2, 15),
      emails: [{ label: "home", value: "jane@example.com" }],
      addresses: [],
      phones: [],
      tags: ["person"],
    });
  });

  it("reports an unreadable birthday and leaves it out", () => {
    const onError = vi.fn();
    const doc = withFields("title: Jane Doe", "tags: [person]", 'CONTACT_BIRTHDAY: "soon"');
    const contact = readContact(doc, settings, onError);

    expect(contact?.name).toBe("Jane Doe");
    expect(contact?.birthday).toBeUndefined();
    expect(onError).toHaveBeenCalledTimes(1);
    expect(onError.mock.calls[0][0]).toBeInstanceOf(ParseError);
  });

  it("returns null for documents that are not contacts", () => {
    expect(readContact(withFields("title: Jane"), settings)).toBeNull();
  });
});
