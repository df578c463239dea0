export { detectOsType, serviceSpecFor, classifyService } from "./service-classifier";
