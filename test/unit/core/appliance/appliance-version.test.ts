// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {describe, it} from 'mocha';
import {ApplianceVersion} from '../../../../src/core/appliance/appliance-version.js';
import {IllegalArgumentError} from '../../../../src/core/errors/illegal-argument-error.js';

describe('ApplianceVersion', (): void => {
  it('should parse a release and keep its text', (): void => {
    const version: ApplianceVersion = ApplianceVersion.parse('2.6.3\n');

    expect(version.text).to.equal('2.6.3');
    expect(version.major).to.equal(2);
    expect(version.isLegacy).to.be.false;
  });

  it('should tell which releases are supported', (): void => {
    expect(ApplianceVersion.parse('2.0.0').isSupported()).to.be.true;
    expect(ApplianceVersion.parse('1.9.9').isSupported()).to.be.false;
    expect(ApplianceVersion.parse('11.10.344').isSupported()).to.be.true;
    expect(ApplianceVersion.parse('11.10.339').isSupported()).to.be.false;
  });

  it('should allow cluster restores only of snapshots from 2.5.0 on', (): void => {
    expect(ApplianceVersion.parse('2.5.0').supportsClusterRestore()).to.be.true;
    expect(ApplianceVersion.parse('2.4.9').supportsClusterRestore()).to.be.false;
    expect(ApplianceVersion.parse('11.10.344').supportsClusterRestore()).to.be.false;
  });

  it('should reject text without a version', (): void => {
    expect((): ApplianceVersion => ApplianceVersion.parse('  ')).to.throw(IllegalArgumentError);
    expect((): ApplianceVersion => ApplianceVersion.parse('unknown')).to.throw(
      IllegalArgumentError,
      "Unrecognised appliance version 'unknown'",
    );
  });
});
