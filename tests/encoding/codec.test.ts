import { detectFormat, fromJSON, parseDocument, parseJSON, toJSON } from '../../src/encoding/codec';
import { DocumentFormat } from '../../src/domain/document';
import { FormatError } from '../../src/domain/errors';

const yamlDoc = Buffer.from('---\nkind: run\nmetadata:\n  name: train\n  iteration: 3\n');

describe('Document codec', () => {
  test('detects YAML by its document marker', () => {
    expect(detectFormat(yamlDoc)).toBe(DocumentFormat.Yaml);
    expect(detectFormat(Buffer.from('{"kind":"run"}'))).toBe(DocumentFormat.Json);
    expect(detectFormat(Buffer.from(''))).toBe(DocumentFormat.Json);
    expect(detectFormat(Buffer.from('--'))).toBe(DocumentFormat.Json);
  });

  test('converts YAML to JSON', () => {
    expect(toJSON(yamlDoc).toString()).toBe('{"kind":"run","metadata":{"name":"train","iteration":3}}');
  });

  test('reads YAML with the core schema', () => {
    const doc = Buffer.from('---\nversion: 0123\ncode: "0123"\n');
    expect(toJSON(doc).toString()).toBe('{"version":123,"code":"0123"}');
  });

  test('returns JSON unchanged', () => {
    const json = Buffer.from('{ "kind" : "run" }');
    expect(toJSON(json)).toBe(json);
  });

  test('an empty YAML document becomes null', () => {
    expect(toJSON(Buffer.from('---\n')).toString()).toBe('null');
  });

  test('rejects malformed YAML', () => {
    expect(() => toJSON(Buffer.from('---\nkey: [unclosed\n'))).toThrow(FormatError);
  });

  test('rejects malformed JSON', () => {
    expect(() => parseJSON(Buffer.from('{"a":'))).toThrow(/^Malformed JSON document: /);
  });

  test('parses either format', () => {
    expect(parseDocument(yamlDoc)).toEqual({ kind: 'run', metadata: { name: 'train', iteration: 3 } });
    expect(parseDocument(Buffer.from('{"a":[1,2]}'))).toEqual({ a: [1, 2] });
  });

  test('encodes back to YAML with the document marker', () => {
    const yaml = fromJSON(Buffer.from('{"kind":"run","metadata":{"name":"train"}}'), DocumentFormat.Yaml);
    expect(yaml.toString()).toBe('---\nkind: run\nmetadata:\n  name: train\n');
    expect(detectFormat(yaml)).toBe(DocumentFormat.Yaml);
  });

  test('JSON encoding is the identity', () => {
    const json = Buffer.from('{"a":1}');
    expect(fromJSON(json, DocumentFormat.Json)).toBe(json);
  });

  test('round-trips a YAML document through JSON', () => {
    const back = fromJSON(toJSON(yamlDoc), DocumentFormat.Yaml);
    expect(parseDocument(back)).toEqual(parseDocument(yamlDoc));
  });
});
