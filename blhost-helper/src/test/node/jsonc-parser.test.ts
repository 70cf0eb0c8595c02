import { expect } from 'chai';
import { parseJsonc } from '../../node/jsonc-parser';

describe('jsonc-parser', () => {
  it('should handle comments', () => {
    const { value, errors } = parseJsonc(`
{
    "device": "FCM363X",
    // comment
    "debug": false
}`);
    expect(errors).to.be.empty;
    expect(value).to.be.deep.equal({ device: 'FCM363X', debug: false });
  });

  it('should handle trailing comma', () => {
    const { value, errors } = parseJsonc(`
{
    "device": "FCM363X",
    "baudrate": 115200,
}`);
    expect(errors).to.be.empty;
    expect(value).to.be.deep.equal({ device: 'FCM363X', baudrate: 115200 });
  });

  it('should parse empty', () => {
    expect(parseJsonc('')).to.be.deep.equal({ value: undefined, errors: [] });
  });

  it('should report errors when parse has failed', () => {
    const { errors } = parseJsonc(`
{
    device:: 'FCM363X'
    trash
}`);
    expect(errors).to.be.not.empty;
    expect(errors[0]).to.match(/^\w+ at \d+$/);
  });
});
