import MiniSearch from "minisearch";
import { Contact } from "./types.js";

interface ContactSearchDoc {
  id: string;
  name: string;
  emails: string;
  phones: string;
  addresses: string;
}

export interface ContactMatch {
  contact: Contact;
  score: number;
}

export class ContactIndex {
  private miniSearch: MiniSearch<ContactSearchDoc>;
  private contacts: Map<string, Contact> = new Map();

  constructor(contacts: Contact[] = []) {
    this.miniSearch = new MiniSearch<ContactSearchDoc>({
      fields: ["name", "emails", "phones", "addresses"],
      searchOptions: {
        boost: { name: 2 },
        fuzzy: 0.2,
        prefix: true,
      },
    });
    contacts.forEach((contact) => this.add(contact));
  }

  add(contact: Contact): void {
    if (this.miniSearch.has(contact.filePath)) {
      this.miniSearch.discard(contact.filePath);
    }
    this.miniSearch.add({
      id: contact.filePath,
      name: contact.name,
      emails: contact.emails.map((entry) => entry.value).join(" "),
      // as written and digits only, so "555 0100" and "5550100" both match
      phones: contact.phones.flatMap((entry) => [entry.value, entry.value.replace(/\D/g, "")]).join(" "),
      addresses: contact.addresses.map((entry) => entry.value).join(" "),
    });
    this.contacts.set(contact.filePath, contact);
  }

  remove(filePath: string): void {
    if (this.miniSearch.has(filePath)) {
      this.miniSearch.discard(filePath);
    }
    this.contacts.delete(filePath);
  }

  get size(): number {
    return this.contacts.size;
  }

  search(query: string, limit: number = 20): ContactMatch[] {
    const matches: ContactMatch[] = [];
    for (const result of this.miniSearch.search(query)) {
      const contact = this.contacts.get(String(result.id));
      if (contact) {
        matches.push({ contact, score: result.score });
      }
      if (matches.length >= limit) {
        break;
      }
    }
    return matches;
  }
}
