import { z } from 'zod'

export const SNAPSHOT_VERSION = 1

const ContactSnapshotSchema = z.object({
  name: z.string(),
  phones: z.array(z.string()),
  /** DD.MM.YYYY, or null when no birthday is recorded */
  birthday: z.string().nullable(),
})

export const AddressBookSnapshotSchema = z.object({
  version: z.literal(SNAPSHOT_VERSION),
  contacts: z.array(ContactSnapshotSchema),
})

export type AddressBookSnapshot = z.infer<typeof AddressBookSnapshotSchema>
