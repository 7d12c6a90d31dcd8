/**
 * Brand symbols for strata's embedded reference values
 *
 * Using Symbol.for() ensures consistent brand checking across modules
 * and prevents property name collisions with user inputs.
 */

/**
 * Brand symbol for OutputReference objects
 */
export const OUTPUT_REFERENCE_BRAND = Symbol.for('Strata.OutputReference');

/**
 * Brand symbol for OutputTemplate objects (strings with embedded references)
 */
export const OUTPUT_TEMPLATE_BRAND = Symbol.for('Strata.OutputTemplate');
