import test from 'node:test';
import assert from 'node:assert/strict';
import { decideFetch } from '../../../services/object-gateway/src/domain/objects/fetch-decision';

test('complete readers never fetch', () => {
  assert.equal(decideFetch({ complete: true, downloadOffset: 12, readOffset: 0 }, 100), 'none');
  assert.equal(decideFetch({ complete: true, downloadOffset: 12, readOffset: 40 }, 1), 'none');
});

test('a cursor past the downloaded prefix fetches the remainder', () => {
  assert.equal(decideFetch({ complete: false, downloadOffset: 1, readOffset: 7 }, 5), 'remainder');
});

test('too few buffered bytes fetch the next chunk', () => {
  assert.equal(decideFetch({ complete: false, downloadOffset: 4, readOffset: 4 }, 1), 'next-chunk');
  assert.equal(decideFetch({ complete: false, downloadOffset: 4, readOffset: 2 }, 3), 'next-chunk');
});

test('enough buffered bytes need no fetch', () => {
  assert.equal(decideFetch({ complete: false, downloadOffset: 4, readOffset: 1 }, 3), 'none');
  assert.equal(decideFetch({ complete: false, downloadOffset: 4, readOffset: 0 }, 0), 'none');
});
