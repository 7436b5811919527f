/**
 * Script Filter feedback: the JSON document Alfred reads from stdout.
 */

export interface FeedbackIcon {
  path: string
  /** "fileicon" shows the icon of the file at `path` */
  type?: 'fileicon' | 'filetype'
}

export interface FeedbackItem {
  title: string
  subtitle?: string
  uid?: string
  type?: 'default' | 'file' | 'file:skipcheck'
  arg?: string
  autocomplete?: string
  /** false: informational, cannot be actioned */
  valid: boolean
  icon?: FeedbackIcon
}

export interface FeedbackDocument {
  items: FeedbackItem[]
}

export function icon(path: string): FeedbackIcon {
  return { path }
}

export function fileIcon(path: string): FeedbackIcon {
  return { type: 'fileicon', path }
}

export class Feedback {
  private readonly items: FeedbackItem[] = []

  add(item: FeedbackItem): this {
    this.items.push(item)
    return this
  }

  /** An item that only shows information. */
  notice(title: string, subtitle: string, iconPath: string): this {
    return this.add({ title, subtitle, valid: false, icon: icon(iconPath) })
  }

  get length(): number {
    return this.items.length
  }

  toJSON(): FeedbackDocument {
    return { items: [...this.items] }
  }

  serialize(): string {
    return JSON.stringify(this.toJSON())
  }
}
