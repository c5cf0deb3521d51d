/**
 * @since 0.1.0
 */

/**
 * @since 0.1.0
 */
export * as Cipher from "./Cipher.js"

/**
 * @since 0.1.0
 */
export * as GCounter from "./GCounter.js"

/**
 * @since 0.1.0
 */
export * as GSet from "./GSet.js"

/**
 * @since 0.1.0
 */
export * as Identity from "./Identity.js"

/**
 * @since 0.1.0
 */
export * as LWWRegister from "./LWWRegister.js"

/**
 * @since 0.1.0
 */
export * as ManagerConfig from "./ManagerConfig.js"

/**
 * @since 0.1.0
 */
export * as Operation from "./Operation.js"

/**
 * @since 0.1.0
 */
export * as ReplicaManager from "./ReplicaManager.js"

/**
 * @since 0.1.0
 */
export * as ReplicatedType from "./ReplicatedType.js"

/**
 * @since 0.1.0
 */
export * as ReplicationError from "./ReplicationError.js"

/**
 * @since 0.1.0
 */
export * as RetryPolicy from "./RetryPolicy.js"

/**
 * @since 0.1.0
 */
export * as Transport from "./Transport.js"
