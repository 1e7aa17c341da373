import { randomUUID } from 'node:crypto'

export { makeId }

type IdPrefix = 'run' | 'batch'

const makeId = (prefix: IdPrefix): string => {
  return `${prefix}_${randomUUID()}`
}
