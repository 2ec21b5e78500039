import { Config, PropertyKeys, RemindersConfig, getContactsDirectory } from "../config/index.js";

export interface LabeledValue {
  label: string;
  value: string;
}

export interface Contact {
  filePath: string;
  name: string;
  birthday?: Date;
  emails: LabeledValue[];
  addresses: LabeledValue[];
  phones: LabeledValue[];
  tags: string[];
}

/** The part of the configuration contact operations need, with paths resolved. */
export interface ContactSettings {
  contactsDirectory: string;
  contactTag: string;
  propertyKeys: PropertyKeys;
  reminders: RemindersConfig;
}

export function resolveContactSettings(config: Config): ContactSettings {
  return {
    contactsDirectory: getContactsDirectory(config),
    contactTag: config.contactTag,
    propertyKeys: config.propertyKeys,
    reminders: config.reminders,
  };
}
