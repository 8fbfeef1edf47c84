import {MountParseError} from '../errors.js'
import {mountTypes, type MountSpec, type MountType} from '../types.js'

function toMountType(value: string): MountType | undefined {
  return mountTypes.find(type => type === value)
}

/**
 * Parses `SRC:DST`. Parts beyond the second (e.g. a `:cached` suffix) are
 * ignored; the mount is always a bind mount.
 */
export function parseColonMount(input: string): MountSpec {
  const parts = input.split(':')
  if (parts.length < 2) {
    throw new MountParseError(input, 'Invalid mount point, expected SOURCE:TARGET')
  }

  return {source: parts[0], target: parts[1], type: 'bind'}
}

/**
 * Parses `key=value,key=value`. Missing keys are allowed; unknown keys,
 * segments without `=` and unknown mount types are not.
 */
export function parseCommaMount(input: string): MountSpec {
  const mount: MountSpec = {}

  for (const segment of input.split(',')) {
    const separator = segment.indexOf('=')
    if (separator === -1) {
      throw new MountParseError(input, `Invalid mount attribute '${segment}'`)
    }

    const name = segment.slice(0, separator)
    const value = segment.slice(separator + 1)

    switch (name) {
      case 'source': {
        mount.source = value
        break
      }

      case 'target': {
        mount.target = value
        break
      }

      case 'type': {
        const type = toMountType(value)
        if (!type) {
          throw new MountParseError(input, `Invalid mount point type: ${value}`)
        }

        mount.type = type
        break
      }

      case 'consistency': {
        mount.consistency = value
        break
      }

      default: {
        throw new MountParseError(input, `Invalid attr '${name}' for mount point`)
      }
    }
  }

  return mount
}

/**
 * Comma form when the string contains a comma, colon form otherwise. A lone
 * `key=value` attribute without any colon is read as comma form too, since
 * the colon form cannot accept it.
 */
export function parseMount(input: string): MountSpec {
  if (input.includes(',') || (input.includes('=') && !input.includes(':'))) {
    return parseCommaMount(input)
  }

  return parseColonMount(input)
}
