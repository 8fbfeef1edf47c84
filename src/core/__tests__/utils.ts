import test from 'ava'
import {formatDuration, isNotFound} from '../utils.js'

test('formatDuration: milliseconds, seconds, minutes', t => {
  t.is(formatDuration(250), '250ms')
  t.is(formatDuration(1500), '1.5s')
  t.is(formatDuration(125_000), '2m 5s')
})

test('isNotFound: only ENOENT errors', t => {
  t.true(isNotFound(Object.assign(new Error('missing'), {code: 'ENOENT'})))
  t.false(isNotFound(Object.assign(new Error('denied'), {code: 'EACCES'})))
  t.false(isNotFound('ENOENT'))
})
