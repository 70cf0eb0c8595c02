import { expect } from 'chai';
import {
  FlashSize,
  parseAddress,
  parseSize,
  toHexAddress,
  toHexSize,
} from '../../common/protocol';

describe('flash-layout', () => {
  it('should format addresses with eight digits', () => {
    expect(toHexAddress(0x8000400)).to.be.equal('0x08000400');
    expect(toHexAddress(0xc0100002)).to.be.equal('0xC0100002');
  });

  it('should format sizes without padding', () => {
    expect(toHexSize(512)).to.be.equal('0x200');
    expect(toHexSize(0x1000000)).to.be.equal('0x1000000');
  });

  it('should parse addresses as hex', () => {
    expect(parseAddress('0x08000000')).to.be.equal(0x08000000);
    expect(parseAddress('18000000')).to.be.equal(0x18000000);
    expect(parseAddress('0X1f')).to.be.equal(0x1f);
    expect(parseAddress('0x1g')).to.be.undefined;
    expect(parseAddress('')).to.be.undefined;
  });

  it('should parse sizes with a base prefix', () => {
    expect(parseSize('0x200')).to.be.equal(512);
    expect(parseSize('512')).to.be.equal(512);
    expect(parseSize('0o10')).to.be.equal(8);
    expect(parseSize('0b101')).to.be.equal(5);
    expect(parseSize('0')).to.be.equal(0);
  });

  it('should reject malformed sizes', () => {
    expect(parseSize('012')).to.be.undefined;
    expect(parseSize('-1')).to.be.undefined;
    expect(parseSize('1.5')).to.be.undefined;
    expect(parseSize('4M')).to.be.undefined;
  });

  it('should map flash size labels to bytes and back', () => {
    expect(FlashSize.toBytes('8M')).to.be.equal(0x800000);
    expect(FlashSize.toBytes('2M')).to.be.undefined;
    expect(FlashSize.fromBytes(0x4000000)).to.be.equal('64M');
    expect(FlashSize.fromBytes(0x250000)).to.be.undefined;
    expect(FlashSize.is('toString')).to.be.false;
  });
});
