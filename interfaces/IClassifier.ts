/**
 * Classifier Interface
 *
 * The model being trained. Both calls must be deterministic given the model's
 * state; either may complete asynchronously.
 */

import { Label } from '../types';

export interface IClassifier<TSample> {
    /**
     * Train on one labeled sample
     */
    update(sample: TSample, label: Label): void | Promise<void>;

    /**
     * Predict the label of a sample
     */
    predict(sample: TSample): Label | Promise<Label>;
}
