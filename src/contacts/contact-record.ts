import { NotFoundError } from './errors.ts'
import { Birthday, Name, Phone } from './fields.ts'

/**
 * One address book entry: a fixed name, any number of phones in the order
 * they were added (repeats allowed), and at most one birthday.
 */
export class ContactRecord {
  private readonly contactName: Name
  private readonly phoneList: Phone[] = []
  private birthdayField: Birthday | undefined

  constructor(name: string) {
    this.contactName = new Name(name)
  }

  get name(): string {
    return this.contactName.value
  }

  get phones(): readonly Phone[] {
    return this.phoneList
  }

  get birthday(): Birthday | undefined {
    return this.birthdayField
  }

  addPhone(raw: string): void {
    this.phoneList.push(new Phone(raw))
  }

  /**
   * The query is validated first, so a malformed number is a FormatError
   * rather than a NotFoundError.
   */
  findPhone(raw: string): Phone {
    const wanted = new Phone(raw)
    const match = this.phoneList.find((phone) => phone.equals(wanted))
    if (!match) {
      throw new NotFoundError(`Phone number ${raw.trim()} not found`, 'phone')
    }
    return match
  }

  removePhone(raw: string): void {
    const match = this.findPhone(raw)
    this.phoneList.splice(this.phoneList.indexOf(match), 1)
  }

  editPhone(oldRaw: string, newRaw: string): void {
    this.findPhone(oldRaw).edit(newRaw)
  }

  addBirthday(raw: string): void {
    this.birthdayField = new Birthday(raw)
  }

  toString(): string {
    const phones = this.phoneList.map((phone) => phone.toString()).join('; ')
    const birthday = this.birthdayField ? `, birthday: ${this.birthdayField}` : ''
    return `Contact name: ${this.contactName}, phones: ${phones}${birthday}`
  }
}
