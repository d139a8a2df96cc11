export {
  assert,
  is_finite_number,
  is_positive_finite,
  is_positive_integer,
} from "./assertions";
export { TYPE_ERROR, TypeError } from "./error";
