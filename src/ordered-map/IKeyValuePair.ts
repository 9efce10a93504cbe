export interface IKeyValuePair<K, V> {
  key: K;
  value: V;
}
