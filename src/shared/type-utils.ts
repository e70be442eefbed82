/**
 * `T` そのもの、または `T` に解決される `PromiseLike` です。非同期シンクのメソッドの戻り値に使います。
 *
 * @template T 解決される値の型です。
 */
export type Awaitable<T> = T | PromiseLike<T>;
