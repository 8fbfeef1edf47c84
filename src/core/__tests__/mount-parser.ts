import test from 'ava'
import {MountParseError} from '../../errors.js'
import {parseColonMount, parseCommaMount, parseMount} from '../mount-parser.js'

// -- Colon form --------------------------------------------------------------

test('parseMount: colon form is a bind mount', t => {
  t.deepEqual(parseMount('/a:/b'), {source: '/a', target: '/b', type: 'bind'})
})

test('parseMount: colon form ignores parts beyond the second', t => {
  t.deepEqual(parseMount('/a:/b:/c'), {source: '/a', target: '/b', type: 'bind'})
  t.deepEqual(parseMount('/a:/b:cached'), {source: '/a', target: '/b', type: 'bind'})
})

test('parseColonMount: requires a target', t => {
  const error = t.throws(() => parseColonMount('/a'), {instanceOf: MountParseError})
  t.is(error?.input, '/a')
})

// -- Comma form --------------------------------------------------------------

test('parseMount: comma form with every attribute', t => {
  t.deepEqual(parseMount('source=/a,target=/b,type=bind,consistency=cached'), {
    source: '/a',
    target: '/b',
    type: 'bind',
    consistency: 'cached'
  })
})

test('parseMount: comma form allows missing keys', t => {
  t.deepEqual(parseMount('source=/a'), {source: '/a'})
  t.deepEqual(parseMount('type=tmpfs,target=/tmp'), {type: 'tmpfs', target: '/tmp'})
})

test('parseCommaMount: value may contain =', t => {
  t.deepEqual(parseCommaMount('source=/a=b,target=/c'), {source: '/a=b', target: '/c'})
})

test('parseCommaMount: rejects unknown attributes', t => {
  const error = t.throws(() => parseCommaMount('source=/a,readonly=true'), {instanceOf: MountParseError})
  t.is(error?.message, 'Config is not valid: Invalid attr \'readonly\' for mount point (mount: \'source=/a,readonly=true\')')
})

test('parseCommaMount: rejects a segment without =', t => {
  const error = t.throws(() => parseCommaMount('source=/a,readonly'), {instanceOf: MountParseError})
  t.is(error?.message, 'Config is not valid: Invalid mount attribute \'readonly\' (mount: \'source=/a,readonly\')')
})

test('parseCommaMount: rejects unknown mount types verbatim', t => {
  const error = t.throws(() => parseCommaMount('source=/a,target=/b,type=nfs'), {instanceOf: MountParseError})
  t.is(error?.message, 'Config is not valid: Invalid mount point type: nfs (mount: \'source=/a,target=/b,type=nfs\')')
})

test('parseMount: comma form wins when both separators appear', t => {
  t.deepEqual(parseMount('source=C:/data,target=/data'), {source: 'C:/data', target: '/data'})
})
