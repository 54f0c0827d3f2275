import axios from "axios";

export const apiClient = axios.create({
  headers: {
    Accept: "application/json",
  },
});

apiClient.interceptors.response.use(
  (response) => response,
  (error) => {
    // Centralized error logging; callers still receive the rejection
    console.error(
      "API Error:",
      axios.isAxiosError(error) ? error.response?.data || error.message : error
    );
    return Promise.reject(error);
  }
);
